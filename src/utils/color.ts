import type { Env } from "../config/env.js";

type Paint = (text: string) => string;

export interface Palette {
  red: Paint;
  green: Paint;
  yellow: Paint;
  bold: Paint;
  dim: Paint;
}

const ANSI: Record<keyof Palette, readonly [number, number]> = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  bold: [1, 22],
  dim: [2, 22],
};

function wrap([open, close]: readonly [number, number]): Paint {
  return (text) => `\u001b[${open}m${text}\u001b[${close}m`;
}

const plain: Paint = (text) => text;

export function createPalette(enabled: boolean): Palette {
  if (!enabled) {
    return { red: plain, green: plain, yellow: plain, bold: plain, dim: plain };
  }
  return {
    red: wrap(ANSI.red),
    green: wrap(ANSI.green),
    yellow: wrap(ANSI.yellow),
    bold: wrap(ANSI.bold),
    dim: wrap(ANSI.dim),
  };
}

export function detectColorSupport(config: Pick<Env, "NO_COLOR" | "FORCE_COLOR">, isTTY: boolean): boolean {
  if (config.FORCE_COLOR !== undefined) {
    return config.FORCE_COLOR;
  }
  if (config.NO_COLOR) {
    return false;
  }
  return isTTY;
}
