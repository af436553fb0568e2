// Clip sample segments against a 100x100 window and print each step.

import type { Rect, Segment, ClipStep } from '../src/types';
import { clipSegment } from '../src/clipSegment';
import { formatRect, formatSegment, formatStep, formatClipResult } from '../src/format';

const rect: Rect = { xMin: 100, yMin: 100, xMax: 200, yMax: 200 };

const cases: [string, Segment][] = [
	['Accept', { p1: { x: 110, y: 110 }, p2: { x: 190, y: 190 } }],
	['Reject right', { p1: { x: 210, y: 110 }, p2: { x: 250, y: 190 } }],
	['Reject top', { p1: { x: 50, y: 250 }, p2: { x: 250, y: 250 } }],
	['Clip 2 corners', { p1: { x: 50, y: 50 }, p2: { x: 250, y: 250 } }],
	['Clip left-right', { p1: { x: 50, y: 150 }, p2: { x: 250, y: 150 } }],
	['Clip bottom-top', { p1: { x: 150, y: 50 }, p2: { x: 150, y: 250 } }],
	['Clip 1 end', { p1: { x: 150, y: 150 }, p2: { x: 250, y: 250 } }]
];

function main() {
	console.log('Clip window: ' + formatRect(rect));

	for(const [name, segment] of cases) {
		const steps: ClipStep[] = [];
		const result = clipSegment(segment, rect, { onStep: (step) => steps.push(step) });

		console.log('\n' + name + ': ' + formatSegment(segment));
		for(const step of steps) console.log('  ' + formatStep(step));
		console.log('Result: ' + formatClipResult(result));
	}
}

main();
