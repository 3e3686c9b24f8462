export type RetrievalErrorCode =
	| 'E_CONFIG'
	| 'E_STATE'
	| 'E_INDEX_CORRUPTION'
	| 'E_INPUT';

export class RetrievalError extends Error {
	readonly code: RetrievalErrorCode;
	constructor(
		code: RetrievalErrorCode,
		message: string,
		opts?: { cause?: unknown }
	) {
		super(message);
		this.name = 'RetrievalError';
		this.code = code;
		if (opts?.cause) {
			this.cause = opts.cause;
		}
	}
}

/** Bad parameters: chunk sizes, top-k, config values. */
export class ConfigurationError extends RetrievalError {
	constructor(
		message: string,
		public readonly issues: string[] = []
	) {
		super(
			'E_CONFIG',
			issues.length ? `${message}:\n- ${issues.join('\n- ')}` : message
		);
		this.name = 'ConfigurationError';
	}
}

/** Index and record store disagree, or an operation hit an impossible state. */
export class StateError extends RetrievalError {
	constructor(message: string, code: RetrievalErrorCode = 'E_STATE') {
		super(code, message);
		this.name = 'StateError';
	}
}

export class IndexCorruptionError extends StateError {
	constructor(
		public readonly expectedDim: number,
		public readonly actualDim: number
	) {
		super(
			`Embedding dimension mismatch: index holds ${expectedDim}-d vectors, got ${actualDim}-d`,
			'E_INDEX_CORRUPTION'
		);
		this.name = 'IndexCorruptionError';
	}
}

/** Malformed caller input: chunk/metadata length mismatch, empty documents. */
export class InputError extends RetrievalError {
	constructor(message: string) {
		super('E_INPUT', message);
		this.name = 'InputError';
	}
}

export function isRetrievalError(e: unknown): e is RetrievalError {
	return e instanceof RetrievalError;
}
