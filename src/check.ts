import type { XY, Rect } from './types';
import { ClipError } from './errors';

export function checkXY(pt: XY) {
	if(!Number.isFinite(pt.x) || !Number.isFinite(pt.y)) {
		throw new ClipError('invalid-point', 'Point (' + pt.x + ', ' + pt.y + ') has a non-finite coordinate.');
	}
}

export function checkRect(rect: Rect) {
	const { xMin, yMin, xMax, yMax } = rect;

	if(![xMin, yMin, xMax, yMax].every(Number.isFinite)) {
		throw new ClipError('invalid-rect', 'Clip window has a non-finite bound.');
	}

	// Equal bounds are a degenerate but valid window.
	if(xMin > xMax || yMin > yMax) {
		throw new ClipError('invalid-rect', 'Clip window is inverted: x ' + xMin + '..' + xMax + ', y ' + yMin + '..' + yMax + '.');
	}
}
