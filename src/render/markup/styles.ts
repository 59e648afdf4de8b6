import chalk from "chalk";

export const COLOR_NAMES = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "gray",
  "bright-black",
  "bright-red",
  "bright-green",
  "bright-yellow",
  "bright-blue",
  "bright-magenta",
  "bright-cyan",
  "bright-white",
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

export const STYLE_OPTIONS = [
  "bold",
  "dim",
  "italic",
  "underscore",
  "reverse",
  "conceal",
] as const;

export type StyleOption = (typeof STYLE_OPTIONS)[number];

export interface MarkupStyle {
  readonly foreground?: ColorName;
  readonly background?: ColorName;
  readonly options: readonly StyleOption[];
}

type Painter = (text: string) => string;

const FOREGROUND: Record<ColorName, Painter> = {
  black: (text) => chalk.black(text),
  red: (text) => chalk.red(text),
  green: (text) => chalk.green(text),
  yellow: (text) => chalk.yellow(text),
  blue: (text) => chalk.blue(text),
  magenta: (text) => chalk.magenta(text),
  cyan: (text) => chalk.cyan(text),
  white: (text) => chalk.white(text),
  gray: (text) => chalk.gray(text),
  "bright-black": (text) => chalk.blackBright(text),
  "bright-red": (text) => chalk.redBright(text),
  "bright-green": (text) => chalk.greenBright(text),
  "bright-yellow": (text) => chalk.yellowBright(text),
  "bright-blue": (text) => chalk.blueBright(text),
  "bright-magenta": (text) => chalk.magentaBright(text),
  "bright-cyan": (text) => chalk.cyanBright(text),
  "bright-white": (text) => chalk.whiteBright(text),
};

const BACKGROUND: Record<ColorName, Painter> = {
  black: (text) => chalk.bgBlack(text),
  red: (text) => chalk.bgRed(text),
  green: (text) => chalk.bgGreen(text),
  yellow: (text) => chalk.bgYellow(text),
  blue: (text) => chalk.bgBlue(text),
  magenta: (text) => chalk.bgMagenta(text),
  cyan: (text) => chalk.bgCyan(text),
  white: (text) => chalk.bgWhite(text),
  gray: (text) => chalk.bgBlackBright(text),
  "bright-black": (text) => chalk.bgBlackBright(text),
  "bright-red": (text) => chalk.bgRedBright(text),
  "bright-green": (text) => chalk.bgGreenBright(text),
  "bright-yellow": (text) => chalk.bgYellowBright(text),
  "bright-blue": (text) => chalk.bgBlueBright(text),
  "bright-magenta": (text) => chalk.bgMagentaBright(text),
  "bright-cyan": (text) => chalk.bgCyanBright(text),
  "bright-white": (text) => chalk.bgWhiteBright(text),
};

const OPTION_PAINTERS: Record<StyleOption, Painter> = {
  bold: (text) => chalk.bold(text),
  dim: (text) => chalk.dim(text),
  italic: (text) => chalk.italic(text),
  underscore: (text) => chalk.underline(text),
  reverse: (text) => chalk.inverse(text),
  conceal: (text) => chalk.hidden(text),
};

export const BUILTIN_STYLES: ReadonlyMap<string, MarkupStyle> = new Map<
  string,
  MarkupStyle
>([
  ["info", { foreground: "green", options: [] }],
  ["comment", { foreground: "yellow", options: [] }],
  ["question", { foreground: "black", background: "cyan", options: [] }],
  ["error", { foreground: "white", background: "red", options: [] }],
]);

/**
 * Resolves a tag body to a style: either a built-in name (`info`) or an
 * inline declaration such as `fg=red;bg=white;options=bold,underscore`.
 * Returns undefined for anything else.
 */
export function resolveStyle(body: string): MarkupStyle | undefined {
  return BUILTIN_STYLES.get(body) ?? parseInlineStyle(body);
}

function parseInlineStyle(body: string): MarkupStyle | undefined {
  let foreground: ColorName | undefined;
  let background: ColorName | undefined;
  const options: StyleOption[] = [];

  for (const declaration of body.split(";")) {
    if (declaration.trim().length === 0) {
      continue;
    }
    const [key, value, ...extra] = declaration.split("=");
    if (value === undefined || extra.length > 0) {
      return undefined;
    }

    const normalized = value.trim().toLowerCase();
    switch (key?.trim().toLowerCase()) {
      case "fg":
        foreground = toColorName(normalized);
        if (!foreground) {
          return undefined;
        }
        break;
      case "bg":
        background = toColorName(normalized);
        if (!background) {
          return undefined;
        }
        break;
      case "options":
        for (const option of normalized.split(",")) {
          const parsed = toStyleOption(option.trim());
          if (!parsed) {
            return undefined;
          }
          options.push(parsed);
        }
        break;
      default:
        return undefined;
    }
  }

  return { foreground, background, options };
}

export function applyStyle(style: MarkupStyle, text: string): string {
  if (text.length === 0) {
    return text;
  }

  let painted = text;
  for (const option of style.options) {
    painted = OPTION_PAINTERS[option](painted);
  }
  if (style.foreground) {
    painted = FOREGROUND[style.foreground](painted);
  }
  if (style.background) {
    painted = BACKGROUND[style.background](painted);
  }
  return painted;
}

function toColorName(value: string): ColorName | undefined {
  return COLOR_NAMES.find((name) => name === value);
}

function toStyleOption(value: string): StyleOption | undefined {
  return STYLE_OPTIONS.find((option) => option === value);
}
