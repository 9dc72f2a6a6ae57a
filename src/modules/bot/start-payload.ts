import { normalizeClientId, validateClientId } from '../metrika/client-id';
import { isValidSubId } from '../postback/postback.service';

// Telegram deep-link payloads: up to 64 chars of [A-Za-z0-9_-].
export const MAX_START_PAYLOAD_LENGTH = 64;
const CLIENT_ID_PREFIX = 'ym_';
// Older landing pages link with start=yandex_<clientId>.
const LEGACY_CLIENT_ID_PREFIX = 'yandex_';
const SUB_ID_PREFIX = 'kt_';
const SEGMENT_SEPARATOR = '-';

export type StartAttribution = {
  clientId: string | null;
  subId: string | null;
};

export function buildStartPayload(attribution: StartAttribution): string {
  const segments: string[] = [];
  if (attribution.clientId && validateClientId(attribution.clientId)) {
    segments.push(
      `${CLIENT_ID_PREFIX}${normalizeClientId(attribution.clientId).replace(/\./g, '_')}`,
    );
  }
  if (attribution.subId && isValidSubId(attribution.subId)) {
    const subSegment = `${SUB_ID_PREFIX}${attribution.subId.trim()}`;
    const withSubId = [...segments, subSegment].join(SEGMENT_SEPARATOR);
    // The click id matters more than the partner sub-id when space runs out.
    if (withSubId.length <= MAX_START_PAYLOAD_LENGTH) {
      segments.push(subSegment);
    }
  }
  return segments.join(SEGMENT_SEPARATOR);
}

export function parseStartPayload(
  payload: string | null | undefined,
): StartAttribution {
  const result: StartAttribution = { clientId: null, subId: null };
  const raw = String(payload ?? '').trim();
  if (!raw || raw.length > MAX_START_PAYLOAD_LENGTH) {
    return result;
  }

  for (const segment of raw.split(SEGMENT_SEPARATOR)) {
    const clientIdPrefix = [CLIENT_ID_PREFIX, LEGACY_CLIENT_ID_PREFIX].find(
      (prefix) => segment.startsWith(prefix),
    );
    if (clientIdPrefix && !result.clientId) {
      const clientId = segment
        .slice(clientIdPrefix.length)
        .replace(/_/g, '.');
      if (validateClientId(clientId)) {
        result.clientId = clientId;
      }
    } else if (segment.startsWith(SUB_ID_PREFIX) && !result.subId) {
      const subId = segment.slice(SUB_ID_PREFIX.length);
      if (isValidSubId(subId)) {
        result.subId = subId;
      }
    }
  }
  return result;
}
