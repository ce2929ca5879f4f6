/**
 * Permutation algebra for Transpose rewriting.
 *
 * A permutation `p` of rank `r` is a bijection on `[0, r)`. Transposing a tensor
 * by `p` yields `out.shape[i] = in.shape[p[i]]`.
 */

import { InvalidPermutationError } from "../errors";
import type { PartialShape } from "./shape";

export type Permutation = readonly number[];

export function isPermutation(perm: readonly number[]): boolean {
  const seen = new Set<number>();
  for (const axis of perm) {
    if (!Number.isInteger(axis) || axis < 0 || axis >= perm.length) return false;
    if (seen.has(axis)) return false;
    seen.add(axis);
  }
  return true;
}

function requirePermutation(perm: readonly number[], label: string): void {
  if (!isPermutation(perm)) {
    throw new InvalidPermutationError(`${label} [${perm}] is not a permutation`);
  }
}

export function identityPermutation(rank: number): number[] {
  return Array.from({ length: rank }, (_, i) => i);
}

/** The default Transpose permutation: axes reversed. */
export function reversedPermutation(rank: number): number[] {
  return identityPermutation(rank).reverse();
}

export function isIdentityPermutation(perm: Permutation): boolean {
  return perm.every((axis, i) => axis === i);
}

export function permutationsEqual(a: Permutation, b: Permutation): boolean {
  if (a.length !== b.length) return false;
  return a.every((axis, i) => axis === b[i]);
}

/**
 * The permutation equivalent to transposing by `first` and then by `second`:
 * `r[i] = first[second[i]]`.
 */
export function composePermutations(first: Permutation, second: Permutation): number[] {
  requirePermutation(first, "composePermutations: first");
  requirePermutation(second, "composePermutations: second");
  if (first.length !== second.length) {
    throw new InvalidPermutationError(
      `composePermutations: rank mismatch ${first.length} vs ${second.length}`,
    );
  }
  return second.map((axis) => first[axis]);
}

export function invertPermutation(perm: Permutation): number[] {
  requirePermutation(perm, "invertPermutation");
  const inverse = new Array<number>(perm.length);
  perm.forEach((axis, i) => {
    inverse[axis] = i;
  });
  return inverse;
}

export function areInversePermutations(a: Permutation, b: Permutation): boolean {
  if (a.length !== b.length) return false;
  if (!isPermutation(a) || !isPermutation(b)) return false;
  return isIdentityPermutation(composePermutations(a, b));
}

/**
 * Shape of the result of transposing a value of `shape` by `perm`.
 */
export function permuteShape<T extends number | null>(
  shape: readonly T[],
  perm: Permutation,
): T[] {
  if (shape.length !== perm.length) {
    throw new InvalidPermutationError(
      `permuteShape: shape rank ${shape.length} does not match permutation rank ${perm.length}`,
    );
  }
  return perm.map((axis) => shape[axis]);
}

export function permutePartialShape(
  shape: PartialShape | undefined,
  perm: Permutation,
): (number | null)[] | undefined {
  if (!shape || shape.length !== perm.length) return undefined;
  return permuteShape(shape, perm);
}
