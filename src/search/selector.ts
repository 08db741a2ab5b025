import { InvalidSelectionError } from "../errors.js";
import type { SessionCandidate } from "./types.js";

/**
 * Map one line of user input to the candidate displayed at that rank.
 * Anything other than an integer in 1..N throws; there is no retry.
 */
export function selectCandidate(
  input: string,
  candidates: readonly SessionCandidate[],
): SessionCandidate {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidSelectionError(input, candidates.length);
  }
  const rank = Number(trimmed);
  const chosen = candidates.find((c) => c.rank === rank);
  if (!chosen) {
    throw new InvalidSelectionError(input, candidates.length);
  }
  return chosen;
}
