export class AssertionError extends Error {

}

const show = (v: unknown) => String(v)

export const AVLAssertions = {
  balanceOutOfRange: (v: unknown, balance: number) => {
    throw new AssertionError(`Node ${show(v)} has balance ${balance}, expected one of -1, 0, 1`)
  },
  balanceMismatch: (v: unknown, balance: number, actual: number) => {
    throw new AssertionError(`Node ${show(v)} stores balance ${balance} but its subtrees differ by ${actual}`)
  },
  notSmaller: (v: unknown, bound: unknown) => {
    throw new AssertionError(`Node ${show(v)} sits on the smaller side of ${show(bound)} but is not smaller`)
  },
  notBigger: (v: unknown, bound: unknown) => {
    throw new AssertionError(`Node ${show(v)} sits on the bigger side of ${show(bound)} but is not bigger`)
  },
  staleParent: (v: unknown, expected: unknown) => {
    throw new AssertionError(`Node ${show(v)} does not point back to its parent ${show(expected)}`)
  },
  rootHasParent: (v: unknown) => {
    throw new AssertionError(`Root ${show(v)} has a parent`)
  },
  invalidCount: (v: unknown, count: number) => {
    throw new AssertionError(`Node ${show(v)} has count ${count}`)
  }
}
