import type { XY, Rect } from './types';

// Region codes around the window:
//
//         left  mid  right
//    top  1001  1000  1010
//    mid  0001  0000  0010
// bottom  0101  0100  0110

export enum Outcode {
	inside = 0,
	left = 1,
	right = 2,
	bottom = 4,
	top = 8
}

export type OutcodeSide = 'top' | 'bottom' | 'right' | 'left';

/** Sides in the order boundaries are clipped against. */
const sides: [OutcodeSide, Outcode][] = [
	['top', Outcode.top],
	['bottom', Outcode.bottom],
	['right', Outcode.right],
	['left', Outcode.left]
];

/** Classify a point against the window. Points on a bound count as inside on that axis.
  * Coordinates must be finite. */

export function computeOutcode(pt: XY, rect: Rect): Outcode {
	let code = Outcode.inside;

	if(pt.x < rect.xMin) code |= Outcode.left;
	else if(pt.x > rect.xMax) code |= Outcode.right;

	if(pt.y < rect.yMin) code |= Outcode.bottom;
	else if(pt.y > rect.yMax) code |= Outcode.top;

	return code;
}

export function isInside(pt: XY, rect: Rect) {
	return computeOutcode(pt, rect) == Outcode.inside;
}

export function outcodeSides(code: number): OutcodeSide[] {
	return sides.filter(([, flag]) => code & flag).map(([side]) => side);
}
