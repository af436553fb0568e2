export type { XY, Rect, Segment, ClipStep, ClipOptions } from './types';
export type { OutcodeSide } from './outcode';
export type { ClipErrorCode } from './errors';

export { Outcode, computeOutcode, isInside, outcodeSides } from './outcode';
export { clipSegment, intersectEdge } from './clipSegment';
export { checkXY, checkRect } from './check';
export { ClipError } from './errors';
export { formatXY, formatSegment, formatRect, formatStep, formatClipResult } from './format';
