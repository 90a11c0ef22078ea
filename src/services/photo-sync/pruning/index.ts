export { type PruneDeps, runPrune } from './pruner.js'
