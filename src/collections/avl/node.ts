import { Balance, Comparator, Side, isUnbalanced } from './share'
import { logg, Level, enabled } from '../../log'

const trace = <T> (what: string, node: AVLNode<T>) => {
  if (enabled(Level.DEBUG)) {
    logg(`${what} at ${String(node.value)} (balance: ${node.balance})`, Level.DEBUG)
  }
}

/**
 * A tree vertex. `smaller` and `bigger` are owned by this node, `parent` is a lookup
 * aid only and is rewritten on every structural edit (insert, splice, rotation).
 */
export class AVLNode<T> {
  value: T
  count: number
  balance: number
  smaller: AVLNode<T> | null
  bigger: AVLNode<T> | null
  parent: AVLNode<T> | null

  constructor (value: T, parent: AVLNode<T> | null) {
    this.value = value
    this.count = 1
    this.balance = Balance.BALANCED
    this.smaller = null
    this.bigger = null
    this.parent = parent
  }

  /**
   * Descends from this node towards `value`.
   *
   * @returns the node holding `value` or, when absent, the last node visited, which is
   * the parent of the insertion point.
   */
  locate (value: T, compare: Comparator<T>): AVLNode<T> {
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    let p: AVLNode<T> = this
    for (;;) {
      const rv = compare(value, p.value)
      const next = rv === 0 ? null : rv < 0 ? p.smaller : p.bigger
      if (next === null) {
        return p
      }
      p = next
    }
  }

  find (value: T, compare: Comparator<T>): AVLNode<T> | null {
    const p = this.locate(value, compare)
    return compare(value, p.value) === 0 ? p : null
  }

  min (): AVLNode<T> {
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    let p: AVLNode<T> = this
    let l
    while ((l = p.smaller) !== null) {
      p = l
    }
    return p
  }

  setChild (side: Side, node: AVLNode<T> | null) {
    if (side === Side.SMALLER) {
      this.smaller = node
    } else {
      this.bigger = node
    }
    if (node !== null) {
      node.parent = this
    }
  }

  sideOf (child: AVLNode<T>) {
    return this.smaller === child ? Side.SMALLER : Side.BIGGER
  }

  /**
   * Walks up from this node after its `side` subtree grew by one level.
   */
  retraceInsertion (side: Side) {
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    let p: AVLNode<T> | null = this
    while (p !== null) {
      // 0 -> +-1 is the only transition that makes this subtree taller
      const grows = p.balance === Balance.BALANCED
      p.balance += side

      if (isUnbalanced(p.balance)) {
        p.rotate()
        return
      }

      const parent: AVLNode<T> | null = p.parent
      if (!grows || parent === null) {
        return
      }
      side = parent.sideOf(p)
      p = parent
    }
  }

  /**
   * Walks up from this node after its `side` subtree shrank by one level.
   */
  retraceRemoval (side: Side) {
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    let p: AVLNode<T> | null = this
    while (p !== null) {
      p.balance -= side

      if (isUnbalanced(p.balance)) {
        p.rotate()
      }

      // +-1 -> 0, directly or through a rotation, leaves this subtree one level shorter
      const parent: AVLNode<T> | null = p.parent
      if (p.balance !== Balance.BALANCED || parent === null) {
        return
      }
      side = parent.sideOf(p)
      p = parent
    }
  }

  private rotate () {
    trace('Rotating', this)
    if (this.balance > 0) {
      this.rotateToSmaller()
    } else {
      this.rotateToBigger()
    }
  }

  /**
   * Exchanges value and count with `other`, the node objects stay in their slots.
   */
  private swapContent (other: AVLNode<T>) {
    const value = this.value
    const count = this.count
    this.value = other.value
    this.count = other.count
    other.value = value
    other.count = count
  }

  /**
   * Restores a subtree whose balance reached +2, with a double rotation when the
   * bigger child leans the other way.
   */
  rotateToSmaller () {
    const y = this.bigger
    if (y === null) {
      return
    }
    // zig-zag: straighten the heavy child first
    if (y.balance < Balance.BALANCED) {
      y.singleToBigger()
    }
    this.singleToSmaller()
  }

  rotateToBigger () {
    const y = this.smaller
    if (y === null) {
      return
    }
    if (y.balance > Balance.BALANCED) {
      y.singleToSmaller()
    }
    this.singleToBigger()
  }

  /**
   * Single left rotation. The node keeps its slot in the parent and
   * receives the content of its bigger child, which moves down to the smaller side.
   *
   * ```
   *     x                y
   *    / \              / \
   *   a   y     =>     x   c
   *      / \          / \
   *     b   c        a   b
   * ```
   */
  private singleToSmaller () {
    const y = this.bigger
    if (y === null) {
      return
    }

    const x = this.balance
    const yb = y.balance

    const a = this.smaller
    const b = y.smaller
    const c = y.bigger

    this.swapContent(y)

    y.smaller = a
    y.bigger = b
    if (a !== null) {
      a.parent = y
    }

    this.smaller = y
    this.bigger = c
    if (c !== null) {
      c.parent = this
    }

    // closed form of the balance of both repositioned nodes
    const lower = x - 1 - Math.max(yb, 0)
    y.balance = lower
    this.balance = yb - 1 + Math.min(lower, 0)
  }

  /**
   * Mirror of {@link singleToSmaller}.
   *
   * ```
   *       x            y
   *      / \          / \
   *     y   c   =>   a   x
   *    / \              / \
   *   a   b            b   c
   * ```
   */
  private singleToBigger () {
    const y = this.smaller
    if (y === null) {
      return
    }

    const x = this.balance
    const yb = y.balance

    const a = y.smaller
    const b = y.bigger
    const c = this.bigger

    this.swapContent(y)

    y.smaller = b
    y.bigger = c
    if (c !== null) {
      c.parent = y
    }

    this.smaller = a
    this.bigger = y
    if (a !== null) {
      a.parent = this
    }

    const lower = x + 1 - Math.min(yb, 0)
    y.balance = lower
    this.balance = yb + 1 + Math.max(lower, 0)
  }
}
