import type { XY, Rect, Segment, ClipOptions } from './types';
import { Outcode, computeOutcode } from './outcode';
import { checkXY, checkRect } from './check';
import { ClipError } from './errors';

/** Each endpoint crosses at most one horizontal and one vertical boundary, so 4 steps
  * settle any segment. The cap only guards the loop against a broken invariant
  * and no known input reaches it. */
const MAX_STEPS = 8;

function checkIntersection(pt: XY) {
	// Extents of finite endpoints can still overflow to infinity.
	if(!Number.isFinite(pt.x) || !Number.isFinite(pt.y)) {
		throw new ClipError('non-finite', 'Boundary intersection (' + pt.x + ', ' + pt.y + ') is not finite.');
	}

	return pt;
}

/** Intersect the line through p1 and p2 with one boundary of the window.
  *
  * @param edge Single boundary flag. If several are set, top, bottom, right, left
  * take priority in that order.
  * @return Point on the boundary line, not snapped or rounded. */

export function intersectEdge(p1: XY, p2: XY, edge: Outcode, rect: Rect): XY {
	const dx = p2.x - p1.x;
	const dy = p2.y - p1.y;

	// A segment parallel to a boundary and outside it is rejected before reaching here.
	if(edge & (Outcode.top | Outcode.bottom)) {
		if(dy == 0) {
			throw new ClipError('zero-extent', 'Segment is horizontal; cannot intersect with ' + (edge & Outcode.top ? 'top' : 'bottom') + ' clip edge.');
		}

		const y = edge & Outcode.top ? rect.yMax : rect.yMin;
		return checkIntersection({ x: p1.x + dx * (y - p1.y) / dy, y });
	}

	if(edge & (Outcode.right | Outcode.left)) {
		if(dx == 0) {
			throw new ClipError('zero-extent', 'Segment is vertical; cannot intersect with ' + (edge & Outcode.right ? 'right' : 'left') + ' clip edge.');
		}

		const x = edge & Outcode.right ? rect.xMax : rect.xMin;
		return checkIntersection({ x, y: p1.y + dy * (x - p1.x) / dx });
	}

	throw new RangeError('Invalid edge value ' + edge);
}

/** Clip a line segment to a rectangular window (Cohen-Sutherland).
  *
  * Endpoint order is preserved. A segment needing no clipping is returned as is.
  *
  * @return Visible part of the segment, or undefined if none of it is inside. */

export function clipSegment(segment: Segment, rect: Rect, options: ClipOptions = {}): Segment | undefined {
	if(options.validate !== false) {
		checkRect(rect);
		checkXY(segment.p1);
		checkXY(segment.p2);
	}

	let { p1, p2 } = segment;
	let code1 = computeOutcode(p1, rect);
	let code2 = computeOutcode(p2, rect);

	for(let step = 0; ; ++step) {
		// Both endpoints inside.
		if(!(code1 | code2)) return step ? { p1, p2 } : segment;

		// Both endpoints beyond the same boundary.
		if(code1 & code2) return void 0;

		if(step >= MAX_STEPS) {
			throw new ClipError('no-convergence', 'Clipping did not settle within ' + MAX_STEPS + ' steps.');
		}

		const endpoint = code1 ? 1 : 2;
		const code = code1 || code2;
		const edge: Outcode = (
			code & Outcode.top ||
			code & Outcode.bottom ||
			code & Outcode.right ||
			code & Outcode.left
		);

		const point = intersectEdge(p1, p2, edge, rect);

		if(endpoint == 1) {
			p1 = point;
			code1 = computeOutcode(p1, rect);
		} else {
			p2 = point;
			code2 = computeOutcode(p2, rect);
		}

		if(options.onStep) options.onStep({ endpoint, edge, point });
	}
}
