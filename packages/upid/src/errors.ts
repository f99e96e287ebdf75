/**
 * Reason codes for UpidError.
 */
export type UpidErrorReason =
	| 'invalid_length' // wrong byte or character count
	| 'invalid_char' // character outside the alphabet
	| 'overflow' // final symbol sets the padding bit
	| 'out_of_range'; // timestamp or integer not representable

/**
 * Error thrown when an identifier cannot be encoded, decoded or constructed.
 */
export class UpidError extends Error {
	constructor(
		message: string,
		public readonly reason: UpidErrorReason,
		public readonly input?: string,
	) {
		super(message);
		this.name = 'UpidError';
	}
}
