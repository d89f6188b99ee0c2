import random from 'random'
import { ITree } from '@/collections/avl'
import { diagnose } from '@/debug'

const swap = <T> (array: T[], i: number, j: number) => {
  const tmp = array[i]
  array[i] = array[j]
  array[j] = tmp
}

export const shuffle = <T> (array: T[]) => {
  for (let i = array.length; i > 1; i--) {
    swap(array, i - 1, random.int(0, i - 1))
  }
}

// eslint-disable-next-line generator-star-spacing
export const range = function* (min: number, max: number) {
  while (min < max) {
    yield min++
  }
}

// eslint-disable-next-line generator-star-spacing
export const chars = function* (first: string, last: string) {
  for (let c = first.charCodeAt(0); c <= last.charCodeAt(0); c++) {
    yield String.fromCharCode(c)
  }
}

/**
 * Heap's algorithm, yields every ordering of `items` (as the same, reused array).
 */
// eslint-disable-next-line generator-star-spacing
export const permutations = function* <T> (items: T[]): Generator<T[], void, unknown> {
  const a = [...items]
  const c = a.map(() => 0)

  yield a

  let i = 1
  while (i < a.length) {
    if (c[i] < i) {
      swap(a, (i & 1) === 0 ? 0 : c[i], i)
      yield a
      c[i]++
      i = 1
    } else {
      c[i] = 0
      i++
    }
  }
}

export const expectValid = <T> (tree: ITree<T>) => {
  expect(diagnose(tree)).toBe('')
}

export const heightBound = (n: number) => 1.44 * Math.log2(n + 2)
