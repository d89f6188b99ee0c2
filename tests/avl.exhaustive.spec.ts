import { NewAVLTree, Status } from '@/collections/avl'
import { diagnose } from '@/debug'
import { permutations, range } from './util'

const fail = (what: string, order: number[], removal: number[] = []) => {
  throw new Error(`${what} after adding [${order.join(', ')}] and removing [${removal.join(', ')}]`)
}

describe('Test Every Small Ordering', () => {
  it('Will stay valid for every insertion order of 7 values', () => {
    const values = [...range(0, 7)]
    let runs = 0

    for (const order of permutations(values)) {
      const tree = NewAVLTree<number>()
      for (const v of order) {
        tree.add(v)
        const problem = diagnose(tree)
        if (problem) {
          fail(problem, order)
        }
      }
      // the sparsest AVL tree of height 4 has exactly 7 nodes
      expect(tree.height).toBeLessThanOrEqual(4)
      runs++
    }

    expect(runs).toBe(5040)
  })

  it('Will empty the tree for every insertion and removal order of 5 values', () => {
    const values = [...range(0, 5)]
    let runs = 0

    for (const order of permutations(values)) {
      const inserted = [...order]
      for (const removal of permutations(values)) {
        const tree = NewAVLTree<number>()
        for (const v of inserted) {
          tree.add(v)
        }

        for (const v of removal) {
          if (tree.remove(v) !== Status.SUCCESS) {
            fail(`Missing ${v}`, inserted, removal)
          }
          const problem = diagnose(tree)
          if (problem) {
            fail(problem, inserted, removal)
          }
        }

        if (tree.root !== null) {
          fail('Tree not empty', inserted, removal)
        }
        runs++
      }
    }

    expect(runs).toBe(120 * 120)
  })

  it('Will remove 8 values in sorted, reverse and insertion order', () => {
    const values = [...range(0, 8)]
    const sorted = [...values]
    const reversed = [...values].reverse()

    for (const order of permutations(values)) {
      const inserted = [...order]
      for (const removal of [sorted, reversed, inserted]) {
        const tree = NewAVLTree<number>()
        for (const v of inserted) {
          tree.add(v)
        }
        for (const v of removal) {
          tree.remove(v)
          const problem = diagnose(tree)
          if (problem) {
            fail(problem, inserted, removal)
          }
        }
        expect(tree.size).toBe(0)
      }
    }
  })

  it('Will handle duplicates in every order', () => {
    const values = [1, 1, 2, 3, 3, 3]

    for (const order of permutations(values)) {
      const tree = NewAVLTree<number>()
      for (const v of order) {
        tree.add(v)
      }

      expect(tree.size).toBe(3)
      expect(tree.countOf(3)).toBe(3)
      expect(diagnose(tree)).toBe('')

      for (const v of order) {
        expect(tree.remove(v)).toBe(Status.SUCCESS)
      }
      expect(tree.root).toBeNull()
      expect(tree.remove(1)).toBe(Status.VALUE_NOT_FOUND)
    }
  })
})
