export { AVLNode, AVLTree, ITree, NewAVLTree, NewAVLTreeOf, Balance, Comparable, Comparator, Ordered, Side, Status, comparing, natural } from './collections/avl'
export { Level, logg, setLevel, getLevel } from './log'
