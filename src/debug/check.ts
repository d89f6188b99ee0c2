import { AVLNode, ITree } from '../collections/avl'
import { Comparator, isUnbalanced } from '../collections/avl/share'
import { AVLAssertions, AssertionError } from './assertions'

const checkChild = <T> (node: AVLNode<T>, child: AVLNode<T> | null) => {
  if (child !== null && child.parent !== node) {
    AVLAssertions.staleParent(child.value, node.value)
  }
}

/**
 * Recomputes the height of the subtree at `node`, checking every invariant on the way
 * down. `low` and `high` are the closest ancestors the subtree must stay between.
 *
 * @throws AssertionError on the first violation found
 */
export const heightOf = <T> (node: AVLNode<T> | null, compare: Comparator<T>, low: AVLNode<T> | null = null, high: AVLNode<T> | null = null): number => {
  if (node === null) {
    return 0
  }

  if (!Number.isInteger(node.count) || node.count < 1) {
    AVLAssertions.invalidCount(node.value, node.count)
  }

  if (isUnbalanced(node.balance)) {
    AVLAssertions.balanceOutOfRange(node.value, node.balance)
  }

  if (low !== null && compare(low.value, node.value) >= 0) {
    AVLAssertions.notBigger(node.value, low.value)
  }

  if (high !== null && compare(node.value, high.value) >= 0) {
    AVLAssertions.notSmaller(node.value, high.value)
  }

  checkChild(node, node.smaller)
  checkChild(node, node.bigger)

  const s = heightOf(node.smaller, compare, low, node)
  const b = heightOf(node.bigger, compare, node, high)

  if (b - s !== node.balance) {
    AVLAssertions.balanceMismatch(node.value, node.balance, b - s)
  }

  return 1 + Math.max(s, b)
}

/**
 * @returns the true height of the tree
 * @throws AssertionError on the first violated invariant
 */
export const verify = <T> (tree: ITree<T>) => {
  const root = tree.root
  if (root !== null && root.parent !== null) {
    AVLAssertions.rootHasParent(root.value)
  }
  return heightOf(root, tree.compare)
}

export const diagnose = <T> (tree: ITree<T>) => {
  try {
    verify(tree)
  } catch (e) {
    if (e instanceof AssertionError) {
      return e.message
    }
    throw e
  }
  return ''
}
