export { InstructionWriter } from './writer.js';
export { MarkerStore, validateReviewId, PASSED_MARKER_EXT } from './markers.js';
export { buildInstructionFile, describeScope, MARK_PASSED_TOOL } from './builder.js';
export {
  computeReviewId,
  sanitizeForId,
  pathsComponent,
  contentHash,
  MISSING_CONTENT,
} from './reviewId.js';
