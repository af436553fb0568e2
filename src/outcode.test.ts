import { describe, it, expect } from 'vitest';

import type { Rect } from './types';
import { Outcode, computeOutcode, isInside, outcodeSides } from './outcode';

const rect: Rect = { xMin: 100, yMin: 100, xMax: 200, yMax: 200 };

describe('computeOutcode', () => {
	it('classifies all nine regions', () => {
		const regions: [number, number, number][] = [
			[50, 250, Outcode.left | Outcode.top],
			[150, 250, Outcode.top],
			[250, 250, Outcode.right | Outcode.top],
			[50, 150, Outcode.left],
			[150, 150, Outcode.inside],
			[250, 150, Outcode.right],
			[50, 50, Outcode.left | Outcode.bottom],
			[150, 50, Outcode.bottom],
			[250, 50, Outcode.right | Outcode.bottom]
		];

		for(const [x, y, code] of regions) {
			expect(computeOutcode({ x, y }, rect)).toBe(code);
		}
	});

	it('counts points on the boundary as inside', () => {
		expect(computeOutcode({ x: 100, y: 100 }, rect)).toBe(Outcode.inside);
		expect(computeOutcode({ x: 200, y: 200 }, rect)).toBe(Outcode.inside);
		expect(computeOutcode({ x: 100, y: 150 }, rect)).toBe(Outcode.inside);
		expect(computeOutcode({ x: 150, y: 200 }, rect)).toBe(Outcode.inside);
	});

	it('handles a window of zero width', () => {
		const line: Rect = { xMin: 100, yMin: 100, xMax: 100, yMax: 200 };

		expect(computeOutcode({ x: 100, y: 150 }, line)).toBe(Outcode.inside);
		expect(computeOutcode({ x: 99.5, y: 150 }, line)).toBe(Outcode.left);
		expect(computeOutcode({ x: 100.5, y: 150 }, line)).toBe(Outcode.right);
	});
});

describe('isInside', () => {
	it('matches the inside outcode', () => {
		expect(isInside({ x: 150, y: 200 }, rect)).toBe(true);
		expect(isInside({ x: 150, y: 200.001 }, rect)).toBe(false);
	});
});

describe('outcodeSides', () => {
	it('lists sides in clipping priority order', () => {
		expect(outcodeSides(Outcode.left | Outcode.top)).toEqual(['top', 'left']);
		expect(outcodeSides(Outcode.right | Outcode.bottom)).toEqual(['bottom', 'right']);
	});

	it('is empty for points inside', () => {
		expect(outcodeSides(Outcode.inside)).toEqual([]);
	});
});
