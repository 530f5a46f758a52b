/**
 * Directions and direction profiles.
 *
 * A profile binds the four tokens a source can reference to the physical
 * values of one direction. Both profiles are built once, frozen, and shared.
 */

import { InvalidDirectionError } from "./errors.js";

export const Direction = {
  LTR: "ltr",
  RTL: "rtl",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** Every supported direction, ltr first. */
export const DIRECTIONS: readonly Direction[] = [Direction.LTR, Direction.RTL];

export type Side = "left" | "right";

export interface DirectionProfile {
  readonly direction: Direction;
  readonly defaultFloat: Side;
  readonly oppositeFloat: Side;
  readonly defaultDirection: Direction;
  readonly oppositeDirection: Direction;
}

// ---------- Tokens ----------

export const TOKEN_NAMES = [
  "defaultFloat",
  "oppositeFloat",
  "defaultDirection",
  "oppositeDirection",
] as const;

export type TokenName = (typeof TOKEN_NAMES)[number];

/** Kebab-case spellings, as written in `#{$default-float}`. */
const TOKEN_ALIASES: Record<string, TokenName> = {
  "default-float": "defaultFloat",
  "opposite-float": "oppositeFloat",
  "default-direction": "defaultDirection",
  "opposite-direction": "oppositeDirection",
};

/**
 * Map a reference name (canonical or kebab-case alias) to its token.
 * Returns null for names that are not tokens.
 */
export function canonicalTokenName(name: string): TokenName | null {
  for (const token of TOKEN_NAMES) {
    if (token === name) return token;
  }
  return TOKEN_ALIASES[name] ?? null;
}

// ---------- Profiles ----------

const LTR_PROFILE: DirectionProfile = Object.freeze({
  direction: Direction.LTR,
  defaultFloat: "left",
  oppositeFloat: "right",
  defaultDirection: Direction.LTR,
  oppositeDirection: Direction.RTL,
});

const RTL_PROFILE: DirectionProfile = Object.freeze({
  direction: Direction.RTL,
  defaultFloat: "right",
  oppositeFloat: "left",
  defaultDirection: Direction.RTL,
  oppositeDirection: Direction.LTR,
});

export function isDirection(value: unknown): value is Direction {
  return value === Direction.LTR || value === Direction.RTL;
}

/**
 * Resolve the profile for a direction.
 *
 * @throws InvalidDirectionError for anything other than exactly "ltr" or "rtl"
 */
export function resolveProfile(direction: string): DirectionProfile {
  switch (direction) {
    case Direction.LTR:
      return LTR_PROFILE;
    case Direction.RTL:
      return RTL_PROFILE;
    default:
      throw new InvalidDirectionError(direction);
  }
}

export function oppositeOf(direction: Direction): Direction {
  return direction === Direction.LTR ? Direction.RTL : Direction.LTR;
}

/** The bound value of a token under a profile. */
export function bindingFor(profile: DirectionProfile, token: TokenName): string {
  return profile[token];
}

// ---------- Alias helpers ----------

/**
 * Resolve a float keyword through a profile: `left` becomes the profile's
 * default side and `right` its opposite. Any other value is returned as is.
 */
export function resolveFloat(value: string, profile: DirectionProfile): string {
  switch (value) {
    case "left":
      return profile.defaultFloat;
    case "right":
      return profile.oppositeFloat;
    default:
      return value;
  }
}

/** Same mapping as resolveFloat, for `text-align` values. */
export function resolveTextAlign(value: string, profile: DirectionProfile): string {
  return resolveFloat(value, profile);
}
