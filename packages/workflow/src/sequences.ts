import { ScaffoldMismatchError } from "@pequant/errors";

/** Sense extensions for the first scaffold start with these bases */
export const SCAFFOLD1_PREFIX = "gtgc";
export const SCAFFOLD2_PREFIX = "gtcc";

/** Drops lower-case adapter bases from the start */
export function trimLeadingAdapter(sequence: string): string {
  return sequence.replace(/^[a-z]+/, "");
}

/** Drops lower-case adapter bases from both ends */
export function trimAdapters(sequence: string): string {
  return sequence.replace(/^[a-z]+|[a-z]+$/g, "");
}

/**
 * Rewrites a scaffold-1 sense extension for scaffold 2.
 *
 * @throws {ScaffoldMismatchError} if `sense` does not start with the
 *   scaffold-1 bases
 */
export function toScaffold2(designId: string, sense: string): string {
  if (!sense.startsWith(SCAFFOLD1_PREFIX)) {
    throw new ScaffoldMismatchError(designId, SCAFFOLD1_PREFIX);
  }
  return SCAFFOLD2_PREFIX + sense.slice(SCAFFOLD1_PREFIX.length);
}
