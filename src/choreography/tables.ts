import { ConfigurationError } from "../errors";

export type Rgb = readonly [number, number, number];

export const LED_COLORS = {
  red: [255, 0, 0],
  orange: [255, 127, 0],
  yellow: [255, 255, 0],
  green: [0, 255, 0],
  blue: [0, 0, 255],
  purple: [255, 0, 255],
  dim_red: [127, 0, 0],
  dim_orange: [127, 63, 0],
  dim_yellow: [127, 127, 0],
  dim_green: [0, 127, 0],
  dim_blue: [0, 0, 127],
  dim_purple: [127, 0, 127],
  off: [0, 0, 0],
} as const satisfies Record<string, Rgb>;

/** The rabbit numbers its ears from the right. */
export const EARS = {
  left: [1],
  right: [0],
  both: [0, 1],
} as const satisfies Record<string, readonly number[]>;

export const LEDS = {
  bottom: 0,
  left: 1,
  middle: 2,
  right: 3,
  top: 4,
} as const satisfies Record<string, number>;

export const EAR_DIRECTIONS = {
  forward: 0,
  backward: 1,
} as const satisfies Record<string, number>;

export type ColorName = keyof typeof LED_COLORS;
export type EarName = keyof typeof EARS;
export type LedName = keyof typeof LEDS;
export type EarDirection = keyof typeof EAR_DIRECTIONS;

function lookup<T>(table: Record<string, T>, kind: string, name: string): T {
  if (!Object.prototype.hasOwnProperty.call(table, name)) {
    throw new ConfigurationError(`Unknown ${kind}: ${name}`);
  }
  return table[name];
}

export function colorRgb(name: string): Rgb {
  return lookup<Rgb>(LED_COLORS, "colour", name);
}

export function earIndices(name: string): readonly number[] {
  return lookup<readonly number[]>(EARS, "ear", name);
}

export function ledIndex(name: string): number {
  return lookup<number>(LEDS, "LED", name);
}

export function directionCode(name: string): number {
  return lookup<number>(EAR_DIRECTIONS, "ear direction", name);
}
