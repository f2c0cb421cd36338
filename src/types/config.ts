/**
 * TypeScript interfaces for the pomobar configuration file.
 *
 * Mirrors schemas/config.schema.json. Every field is optional in the file;
 * missing fields are filled from DEFAULT_CONFIG.
 */

/** How the display line is written to stdout */
export type OutputFormat = 'plain' | 'json';

/**
 * Glyphs prefixed to the display line for each phase.
 */
export interface GlyphsConfig {
  work: string;
  break: string;
}

/**
 * Desktop notification settings.
 */
export interface NotificationsConfig {
  /** Whether to notify when a timer crosses zero */
  enabled: boolean;
  /** Executable invoked as `<command> <title> <body>` */
  command: string;
}

/**
 * Fully resolved configuration.
 */
export interface PomobarConfig {
  /** Length of a work phase in minutes */
  work_minutes: number;
  /** Length of a break phase in minutes */
  break_minutes: number;
  /** Path of the well-known endpoint socket */
  socket_path: string;
  /** Longest wait for a command in one display cycle */
  poll_interval_ms: number;
  output: OutputFormat;
  glyphs: GlyphsConfig;
  notifications: NotificationsConfig;
}

/**
 * Shape accepted in the configuration file.
 */
export interface PomobarConfigFile {
  work_minutes?: number;
  break_minutes?: number;
  socket_path?: string;
  poll_interval_ms?: number;
  output?: OutputFormat;
  glyphs?: Partial<GlyphsConfig>;
  notifications?: Partial<NotificationsConfig>;
}

/**
 * Command-line values that override the file.
 */
export interface ConfigOverrides {
  work_minutes?: number;
  break_minutes?: number;
  socket_path?: string;
  poll_interval_ms?: number;
  output?: OutputFormat;
}
