/**
 * Console chrome themes
 *
 * The LED grid paints its own truecolor pixels; themes only color the
 * text around it (help panel, status line, CLI output).
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'ice'
  | 'bladerunner'
  | 'tron'
  | 'oled'
  | 'solarized'
  | 'nord'
  | 'banana';

/**
 * Theme color definition
 */
export interface ThemeColors {
  /** Display name */
  name: string;
  /** Primary text/accent color (ANSI escape) */
  accent: string;
  /** Muted color for secondary text (ANSI escape) */
  subtle: string;
}

/**
 * All theme definitions
 */
export const themes: Record<PhosphorMode, ThemeColors> = {
  cyan: { name: 'Cyberpunk', accent: '\x1b[96m', subtle: '\x1b[38;5;30m' },
  amber: { name: 'Fallout', accent: '\x1b[93m', subtle: '\x1b[38;5;136m' },
  green: { name: 'Matrix', accent: '\x1b[92m', subtle: '\x1b[38;5;28m' },
  white: { name: 'Ghost', accent: '\x1b[97m', subtle: '\x1b[38;5;244m' },
  hotpink: { name: 'Synthwave', accent: '\x1b[95m', subtle: '\x1b[38;5;96m' },
  blood: { name: 'Blood', accent: '\x1b[91m', subtle: '\x1b[38;5;88m' },
  ice: { name: 'Ice', accent: '\x1b[96m', subtle: '\x1b[38;5;67m' },
  bladerunner: { name: 'Blade Runner', accent: '\x1b[38;5;208m', subtle: '\x1b[38;5;94m' },
  tron: { name: 'Tron', accent: '\x1b[96m', subtle: '\x1b[38;5;24m' },
  oled: { name: 'OLED', accent: '\x1b[97m', subtle: '\x1b[38;5;238m' },
  solarized: { name: 'Solarized', accent: '\x1b[36m', subtle: '\x1b[38;5;66m' },
  nord: { name: 'Nord', accent: '\x1b[96m', subtle: '\x1b[38;5;60m' },
  banana: { name: 'Banana', accent: '\x1b[93m', subtle: '\x1b[38;5;142m' },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get theme colors by mode
 */
export function getTheme(mode: PhosphorMode): ThemeColors {
  return themes[mode];
}

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode]?.accent || '\x1b[92m';
}

/**
 * Get muted color for secondary text
 */
export function getSubtleColor(mode: PhosphorMode): string {
  return themes[mode]?.subtle || '\x1b[38;5;236m';
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
