import { AVLNode } from './node'
import { Comparator, Ordered, Side, Status, natural } from './share'
import { logg, Level, enabled } from '../../log'

export { AVLNode } from './node'
export { Balance, Comparable, Comparator, Ordered, Side, Status, comparing, natural } from './share'

export interface ITree<T> {
  add: (value: T) => void

  remove: (value: T) => Status

  contains: (value: T) => boolean

  countOf: (value: T) => number

  clear: () => number

  root: AVLNode<T> | null

  compare: Comparator<T>

  size: number

  total: number

  height: number
}

const heightOf = <T> (node: AVLNode<T> | null): number => {
  let h = 0
  // the balance factor always points at the taller side
  while (node !== null) {
    h++
    node = node.balance < 0 ? node.smaller : node.bigger
  }
  return h
}

export class AVLTree<T> implements ITree<T> {
  readonly compare: Comparator<T>
  private head: AVLNode<T> | null
  private sz: number
  private sum: number

  constructor (compare: Comparator<T>, ...head: [] | [T]) {
    this.compare = compare
    this.head = null
    this.sz = 0
    this.sum = 0

    if (head.length === 1) {
      this.add(head[0])
    }
  }

  public get root () {
    return this.head
  }

  public get size () {
    return this.sz
  }

  public get total () {
    return this.sum
  }

  public get height () {
    return heightOf(this.head)
  }

  public add (value: T) {
    this.sum++

    const head = this.head
    if (head === null) {
      this.head = new AVLNode(value, null)
      this.sz++
      return
    }

    const p = head.locate(value, this.compare)
    const rv = this.compare(value, p.value)
    if (rv === 0) {
      p.count++
      return
    }

    const side = rv < 0 ? Side.SMALLER : Side.BIGGER
    p.setChild(side, new AVLNode(value, p))
    this.sz++

    p.retraceInsertion(side)
  }

  public remove (value: T): Status {
    let p = this.head?.find(value, this.compare) ?? null
    if (p === null) {
      return Status.VALUE_NOT_FOUND
    }

    this.sum--

    if (p.count > 1) {
      p.count--
      return Status.SUCCESS
    }

    this.sz--

    const smaller = p.smaller
    const bigger = p.bigger
    if (smaller !== null && bigger !== null) {
      // successor has no smaller child, remove it in place of p
      const s = bigger.min()
      p.value = s.value
      p.count = s.count
      p = s
    }

    const replacement = p.smaller ?? p.bigger
    const parent = p.parent

    p.smaller = null
    p.bigger = null
    p.parent = null

    if (parent === null) {
      if (replacement !== null) {
        replacement.parent = null
      }
      this.head = replacement
      if (enabled(Level.DEBUG)) {
        logg(`Root replaced by ${replacement === null ? 'nothing' : String(replacement.value)}`, Level.DEBUG)
      }
      return Status.SUCCESS
    }

    const side = parent.sideOf(p)
    parent.setChild(side, replacement)
    parent.retraceRemoval(side)

    return Status.SUCCESS
  }

  public contains (value: T) {
    return this.head?.find(value, this.compare) != null
  }

  public countOf (value: T) {
    return this.head?.find(value, this.compare)?.count ?? 0
  }

  public clear () {
    const sz = this.sz
    this.head = null
    this.sz = 0
    this.sum = 0
    return sz
  }
}

export const NewAVLTree = <T extends Ordered> (...head: [] | [T]): ITree<T> => {
  return new AVLTree<T>(natural, ...head)
}

export const NewAVLTreeOf = <T> (compare: Comparator<T>, ...head: [] | [T]): ITree<T> => {
  return new AVLTree(compare, ...head)
}
