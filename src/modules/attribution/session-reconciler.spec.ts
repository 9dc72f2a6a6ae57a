import { isVisitOpen, latestVisitTime, visitWindowMs } from './session-reconciler';

const HOUR = 60 * 60 * 1000;
const now = new Date('2026-03-10T12:00:00.000Z');
const ago = (ms: number) => new Date(now.getTime() - ms);

describe('session reconciler', () => {
  it('uses twelve hours plus the thirty minute timeout by default', () => {
    expect(visitWindowMs()).toBe(12.5 * HOUR);
    expect(visitWindowMs(1, 0)).toBe(HOUR);
  });

  it('keeps a visit open eleven hours after the last hit', () => {
    const record = { firstVisitTime: ago(20 * HOUR), lastVisitTime: ago(11 * HOUR) };
    expect(isVisitOpen(record, now)).toBe(true);
  });

  it('closes a visit thirteen hours after the last hit', () => {
    const record = { firstVisitTime: ago(20 * HOUR), lastVisitTime: ago(13 * HOUR) };
    expect(isVisitOpen(record, now)).toBe(false);
  });

  it('treats the exact window boundary as still open', () => {
    const boundary = { firstVisitTime: null, lastVisitTime: ago(12.5 * HOUR) };
    const past = { firstVisitTime: null, lastVisitTime: ago(12.5 * HOUR + 1) };
    expect(isVisitOpen(boundary, now)).toBe(true);
    expect(isVisitOpen(past, now)).toBe(false);
  });

  it('falls back to the first visit time', () => {
    const record = { firstVisitTime: ago(2 * HOUR), lastVisitTime: null };
    expect(latestVisitTime(record)).toEqual(ago(2 * HOUR));
    expect(isVisitOpen(record, now)).toBe(true);
  });

  it('reports a closed visit when no timestamp is known', () => {
    const record = { firstVisitTime: null, lastVisitTime: null };
    expect(latestVisitTime(record)).toBeNull();
    expect(isVisitOpen(record, now)).toBe(false);
  });

  it('honours a custom window', () => {
    const record = { firstVisitTime: null, lastVisitTime: ago(2 * HOUR) };
    expect(isVisitOpen(record, now, 1, 30)).toBe(false);
    expect(isVisitOpen(record, now, 2, 0)).toBe(true);
  });
});
