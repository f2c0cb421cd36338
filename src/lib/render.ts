/**
 * Display line rendering.
 *
 * `plain` writes "<glyph> <time>". `json` writes one JSON object per line in
 * the shape status bars with custom JSON modules expect (text, alt, class,
 * tooltip).
 */

import type { GlyphsConfig, OutputFormat } from '../types/config.js';
import type { SessionSnapshot } from '../types/session.js';

export interface RenderOptions {
  format: OutputFormat;
  glyphs: GlyphsConfig;
}

export const DEFAULT_GLYPHS: GlyphsConfig = {
  work: '🍅',
  break: '☕',
};

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  format: 'plain',
  glyphs: DEFAULT_GLYPHS,
};

/**
 * JSON payload written in `json` output mode.
 */
export interface StatusBarPayload {
  text: string;
  alt: string;
  class: string[];
  tooltip: string;
}

export function renderText(snapshot: SessionSnapshot, glyphs: GlyphsConfig): string {
  return `${glyphs[snapshot.phase]} ${snapshot.text}`;
}

export function buildStatusBarPayload(snapshot: SessionSnapshot, glyphs: GlyphsConfig): StatusBarPayload {
  const classes = [
    snapshot.phase,
    snapshot.active ? 'running' : 'paused',
    snapshot.locked ? 'locked' : 'unlocked',
  ];
  if (snapshot.remaining < 0) {
    classes.push('overtime');
  }

  const phaseLabel = snapshot.phase === 'work' ? 'Work' : 'Break';
  const tooltip = [
    phaseLabel,
    snapshot.active ? 'running' : 'paused',
    snapshot.locked ? 'locked' : 'unlocked',
  ].join(' · ');

  return {
    text: renderText(snapshot, glyphs),
    alt: snapshot.phase,
    class: classes,
    tooltip,
  };
}

/**
 * Renders one display line (without trailing newline).
 */
export function renderLine(snapshot: SessionSnapshot, options: RenderOptions = DEFAULT_RENDER_OPTIONS): string {
  if (options.format === 'json') {
    return JSON.stringify(buildStatusBarPayload(snapshot, options.glyphs));
  }
  return renderText(snapshot, options.glyphs);
}
