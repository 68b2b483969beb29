import { InvalidLevelError } from "../utils/errors";
import type { Level } from "./types";

export const LEVELS: readonly Level[] = [1, 2, 3];

export const isLevel = (value: unknown): value is Level => value === 1 || value === 2 || value === 3;

/** Accepts 1, 2, 3 or their string forms; anything else is a caller bug. */
export const assertLevel = (value: unknown): Level => {
  const candidate = typeof value === "string" && /^\s*\d+\s*$/.test(value) ? Number(value) : value;
  if (isLevel(candidate)) return candidate;
  throw new InvalidLevelError(value);
};
