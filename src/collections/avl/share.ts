export type Ordered = number | string | bigint

export type Comparator<T> = (l: T, r: T) => number

export interface Comparable<T> {
  compareTo: (other: T) => number
}

export const enum Status {
  SUCCESS = 0,
  VALUE_NOT_FOUND = 1
}

/**
 * Stored per node as height(bigger) - height(smaller). The unbalanced states only
 * exist between a mutation and the rotation that absorbs it.
 */
export const enum Balance {
  SMALLER_UB = -2,
  SMALLER_HEAVY = -1,
  BALANCED = 0,
  BIGGER_HEAVY = 1,
  BIGGER_UB = 2
}

/**
 * Slot of a child inside its parent, doubling as the sign a height change on that
 * side has on the parent's balance.
 */
export const enum Side {
  SMALLER = -1,
  BIGGER = 1
}

export const natural = <T extends Ordered> (l: T, r: T) => (l < r ? -1 : l > r ? 1 : 0)

export const comparing = <T extends Comparable<T>> (l: T, r: T) => l.compareTo(r)

export const isUnbalanced = (balance: number) => balance > Balance.BIGGER_HEAVY || balance < Balance.SMALLER_HEAVY
