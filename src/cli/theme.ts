import chalk from 'chalk';

export type Palette = {
  gradient: [string, string];
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
};

export function makeChalk(noColor: boolean): chalk.Chalk {
  return new chalk.Instance({ level: noColor ? 0 : 3 });
}

/** Colours result lines: wins, busts and draws; anything else passes through. */
export function toneLine(palette: Palette, text: string): string {
  if (/ wins with /.test(text)) return palette.success(text);
  if (/ busts!$/.test(text)) return palette.error(text);
  if (text === 'Draw!') return palette.warn(text);
  return text;
}

export function getPalette(theme = process.env.CLI_THEME || 'neo', noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color')): Palette {
  const c = makeChalk(noColor);
  switch (theme.toLowerCase()) {
    case 'mono':
      return {
        gradient: ['#777777', '#bbbbbb'],
        info: c.white,
        success: c.white,
        warn: c.white,
        error: c.white,
        dim: c.gray,
      };
    case 'solarized':
      return {
        gradient: ['#268bd2', '#2aa198'],
        info: c.cyan,
        success: c.green,
        warn: c.yellow,
        error: c.red,
        dim: c.gray,
      };
    default:
      // neo: neon blue/indigo
      return {
        gradient: ['#00d4ff', '#3b5bdb'],
        info: c.cyan,
        success: c.green,
        warn: c.yellow,
        error: c.red,
        dim: c.gray,
      };
  }
}
