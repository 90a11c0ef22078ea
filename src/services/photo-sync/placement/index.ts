export { resolvePlacement } from './placement-resolver.js'
