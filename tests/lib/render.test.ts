import { describe, it, expect } from 'vitest';
import { buildStatusBarPayload, renderLine, DEFAULT_RENDER_OPTIONS } from '@/lib/render.js';
import type { SessionSnapshot } from '@/types/session.js';

const glyphs = { work: 'W', break: 'B' };

function snapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    phase: 'work',
    active: false,
    locked: true,
    remaining: 1500,
    notified: false,
    text: '25:00',
    ...overrides,
  };
}

describe('renderLine', () => {
  it('renders glyph and time in plain mode', () => {
    expect(renderLine(snapshot(), { format: 'plain', glyphs })).toBe('W 25:00');
    expect(renderLine(snapshot({ phase: 'break', text: '-00:05' }), { format: 'plain', glyphs })).toBe('B -00:05');
  });

  it('uses the default glyphs when no options are given', () => {
    expect(renderLine(snapshot())).toBe(`${DEFAULT_RENDER_OPTIONS.glyphs.work} 25:00`);
  });

  it('renders one JSON object in json mode', () => {
    const line = renderLine(snapshot({ active: true }), { format: 'json', glyphs });
    expect(line).toBe(
      '{"text":"W 25:00","alt":"work","class":["work","running","locked"],"tooltip":"Work · running · locked"}'
    );
  });
});

describe('buildStatusBarPayload', () => {
  it('marks overtime', () => {
    const payload = buildStatusBarPayload(
      snapshot({ phase: 'break', locked: false, remaining: -3, text: '-00:03' }),
      glyphs
    );
    expect(payload).toEqual({
      text: 'B -00:03',
      alt: 'break',
      class: ['break', 'paused', 'unlocked', 'overtime'],
      tooltip: 'Break · paused · unlocked',
    });
  });
});
