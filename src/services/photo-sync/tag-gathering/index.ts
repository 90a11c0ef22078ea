export { AlbumDirectory } from './album-directory.js'
export { type SearchOutcome, searchAllMediaItems } from './search-pager.js'
export {
  createEmptyGatherResult,
  gatherAlbum,
  gatherFavorites,
  gatherWindow,
  recheckWindowMembership,
  runTagGathering,
  type TagGatherDeps,
} from './tag-gatherer.js'
export {
  buildWindowDateRange,
  computeWindowCutoff,
  isWithinWindow,
} from './window.js'
