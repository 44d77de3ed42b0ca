/**
 * Segment Module
 *
 * Tag-delimited splitting of reply text.
 */

export * from './segment.types.js';
export { splitSegments, joinSegments, createTagPattern } from './segment-splitter.js';
