export { type FetchPassDeps, runFetchPass } from './fetch-pass.js'
export { type PlacementPassDeps, runPlacementPass } from './placement-pass.js'
export { type PushPassDeps, runPushPass } from './push-pass.js'
