export { AssertionError, AVLAssertions } from './assertions'
export { diagnose, heightOf, verify } from './check'
export { render } from './render'
