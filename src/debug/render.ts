import { AVLNode, ITree } from '../collections/avl'

const FILLER = ' '
const BRANCH = '_'

const measure = <T> (node: AVLNode<T> | null): number => node === null ? 0 : 1 + Math.max(measure(node.smaller), measure(node.bigger))

const fill = (c: string, n: number) => n > 0 ? c.repeat(n) : ''

/**
 * Appends the slice of the subtree at `node` found `depth` levels below it. A slice of
 * a subtree of height `height` is always `2^height - 1` characters wide, `null` stands
 * for an absent subtree and renders as blanks.
 */
const slice = <T> (out: string[], node: AVLNode<T> | null, depth: number, height: number, format: (v: T) => string) => {
  if (height <= 0) {
    return
  }

  if (node === null) {
    out.push(fill(FILLER, (1 << height) - 1))
    return
  }

  if (depth === 0) {
    if (height === 1) {
      out.push(format(node.value))
      return
    }

    const half = 1 << (height - 2)
    out.push(fill(FILLER, half))
    out.push(fill(node.smaller === null ? FILLER : BRANCH, half - 1))
    out.push(format(node.value))
    out.push(fill(node.bigger === null ? FILLER : BRANCH, half - 1))
    out.push(fill(FILLER, half))
    return
  }

  slice(out, node.smaller, depth - 1, height - 1, format)
  out.push(FILLER)
  slice(out, node.bigger, depth - 1, height - 1, format)
}

/**
 * Draws the tree level by level. Only lines up for values printed as one character.
 */
export const render = <T> (tree: ITree<T>, format: (v: T) => string = String) => {
  const height = measure(tree.root)
  const lines: string[] = []

  for (let depth = 0; depth < height; depth++) {
    const out: string[] = []
    slice(out, tree.root, depth, height, format)
    lines.push(out.join(''))
  }

  return lines.join('\n')
}
