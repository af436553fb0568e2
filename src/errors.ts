export type ClipErrorCode = 'invalid-point' | 'invalid-rect' | 'zero-extent' | 'non-finite' | 'no-convergence';

/** Thrown when clipping input breaks a precondition, or the engine reaches a state
  * that well-formed input cannot produce. */

export class ClipError extends Error {
	readonly code: ClipErrorCode;

	constructor(code: ClipErrorCode, message: string) {
		super(message);
		this.name = 'ClipError';
		this.code = code;
	}
}
