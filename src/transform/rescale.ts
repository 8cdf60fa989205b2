import type { Cell } from "../types.js";

// Fixed output contract; downstream consumers check against these exact constants.
export const RESCALE_CENTER = 50.5;
export const RESCALE_SPREAD = 34;

export function rescalePercentRank(rank: Cell): Cell {
  if (rank === undefined) {
    return undefined;
  }
  return (rank * 100 - RESCALE_CENTER) / RESCALE_SPREAD;
}
