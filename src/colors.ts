/**
 * Terminal Colors & Formatting
 */

export type ColorName = 'reset' | 'bright' | 'dim' | 'red' | 'green' | 'yellow';

const colors: Record<ColorName, string> = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

export const c = (color: ColorName, text: string): string => `${colors[color]}${text}${colors.reset}`;
export const bold = (text: string): string => c('bright', text);
export const dim = (text: string): string => c('dim', text);
