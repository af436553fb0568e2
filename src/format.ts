import type { XY, Rect, Segment, ClipStep } from './types';
import { outcodeSides } from './outcode';

export function formatXY({ x, y }: XY, digits = 1) {
	return '(' + x.toFixed(digits) + ', ' + y.toFixed(digits) + ')';
}

export function formatSegment({ p1, p2 }: Segment, digits = 1) {
	return formatXY(p1, digits) + ' - ' + formatXY(p2, digits);
}

export function formatRect({ xMin, yMin, xMax, yMax }: Rect, digits = 1) {
	return formatXY({ x: xMin, y: yMin }, digits) + ' .. ' + formatXY({ x: xMax, y: yMax }, digits);
}

export function formatStep({ endpoint, edge, point }: ClipStep, digits = 1) {
	return 'p' + endpoint + ' -> ' + outcodeSides(edge).join('|') + ' ' + formatXY(point, digits);
}

export function formatClipResult(result: Segment | undefined, digits = 1) {
	return result ? formatSegment(result, digits) : 'rejected';
}
