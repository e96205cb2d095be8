export { MessageBuilder, getDefaultRenderProperties } from './MessageBuilder.js';
export type { RenderProperties } from './MessageBuilder.js';
export { SegmentBuilder } from './SegmentBuilder.js';
export { FieldBuilder } from './FieldBuilder.js';
export { RepetitionBuilder } from './RepetitionBuilder.js';
export { ComponentBuilder } from './ComponentBuilder.js';
export { MAX_INDEX } from './indexed.js';
