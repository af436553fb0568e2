import type { Outcode } from './outcode';

export interface XY {
	x: number;
	y: number;
}

/** Axis-aligned clip window. Bounds are inclusive, zero width or height is allowed. */

export interface Rect {
	xMin: number;
	yMin: number;
	xMax: number;
	yMax: number;
}

export interface Segment {
	p1: XY;
	p2: XY;
}

export interface ClipStep {
	/** Which endpoint was moved. */
	endpoint: 1 | 2;
	/** Single boundary flag the endpoint was clipped against. */
	edge: Outcode;
	/** New position of the endpoint, on the boundary line. */
	point: XY;
}

export interface ClipOptions {
	/** Check coordinates and window bounds before clipping. Defaults to true. */
	validate?: boolean;

	/** Called after every boundary intersection, in order. */
	onStep?: (step: ClipStep) => void;
}
