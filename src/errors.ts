export class DomainError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'DomainError';
	}
}

export class GeometryLookupError extends Error {
	public readonly roadId: string;
	public readonly s: number;

	constructor(roadId: string, s: number, message: string) {
		super(`road ${roadId} at s=${s}: ${message}`);
		this.name = 'GeometryLookupError';
		this.roadId = roadId;
		this.s = s;
	}
}

export class EmptyMeshError extends Error {
	public readonly roadId?: string;

	constructor(message: string, roadId?: string) {
		super(message);
		this.name = 'EmptyMeshError';
		this.roadId = roadId;
	}
}

export class ParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ParseError';
	}
}

export type DiagnosticLevel = 'info' | 'warn' | 'error';

export type DiagnosticCode =
	| 'parse-error'
	| 'geometry-lookup'
	| 'empty-mesh'
	| 'unsupported-geometry'
	| 'unsupported-road-mark'
	| 'io-error'
	| 'conversion-error';

export interface Diagnostic {
	level: DiagnosticLevel;
	code: DiagnosticCode;
	message: string;
	roadId?: string;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
