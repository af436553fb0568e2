import { describe, it, expect } from 'vitest';

import { Outcode } from './outcode';
import { clipSegment } from './clipSegment';
import { formatXY, formatSegment, formatRect, formatStep, formatClipResult } from './format';

describe('format', () => {
	it('prints points with one decimal by default', () => {
		expect(formatXY({ x: 110, y: 110 })).toBe('(110.0, 110.0)');
		expect(formatXY({ x: 1 / 3, y: 2 }, 3)).toBe('(0.333, 2.000)');
	});

	it('prints segments and windows', () => {
		expect(formatSegment({ p1: { x: 50, y: 150 }, p2: { x: 250, y: 150 } })).toBe('(50.0, 150.0) - (250.0, 150.0)');
		expect(formatRect({ xMin: 100, yMin: 100, xMax: 200, yMax: 200 })).toBe('(100.0, 100.0) .. (200.0, 200.0)');
	});

	it('prints clip steps', () => {
		expect(formatStep({ endpoint: 2, edge: Outcode.top, point: { x: 200, y: 200 } })).toBe('p2 -> top (200.0, 200.0)');
	});

	it('prints clip results', () => {
		const rect = { xMin: 100, yMin: 100, xMax: 200, yMax: 200 };

		expect(formatClipResult(clipSegment({ p1: { x: 150, y: 50 }, p2: { x: 150, y: 250 } }, rect))).toBe('(150.0, 100.0) - (150.0, 200.0)');
		expect(formatClipResult(clipSegment({ p1: { x: 210, y: 110 }, p2: { x: 250, y: 190 } }, rect))).toBe('rejected');
	});
});
