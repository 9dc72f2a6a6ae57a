const CLIENT_ID_PATTERN = /^(?=.*\d)[\d.]+$/;
export const CLIENT_ID_MIN_LENGTH = 10;
export const CLIENT_ID_MAX_LENGTH = 30;

export function normalizeClientId(id: string | null | undefined): string {
  return String(id ?? '').trim();
}

export function validateClientId(id: string | null | undefined): boolean {
  const clean = normalizeClientId(id);
  if (!clean) {
    return false;
  }
  if (!CLIENT_ID_PATTERN.test(clean)) {
    return false;
  }
  return (
    clean.length >= CLIENT_ID_MIN_LENGTH && clean.length <= CLIENT_ID_MAX_LENGTH
  );
}
