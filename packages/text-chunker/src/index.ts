export { splitText } from './split-text.js';
export { PAGE_BREAK, planPageChunks, splitPages, type TextChunk } from './plan-chunks.js';
