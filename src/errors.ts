/**
 * Fehlerklassen für alle Stufen: Envelope → GVAS → Sub-Codecs → Encode.
 * Alles erbt von SaveToolsError, damit Aufrufer (CLI) eine einzige Meldung ausgeben können.
 */

export class SaveToolsError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Header zu kurz, falsche Magic, unbekannter oder nicht schreibbarer Save-Typ */
export class EnvelopeError extends SaveToolsError {}

/** zlib/Oodle-Fehler oder Ergebnis ohne GVAS-Magic */
export class DecompressionError extends SaveToolsError {}

export class MalformedTreeError extends SaveToolsError {
	readonly offset: number;

	constructor(message: string, offset: number, options?: { cause?: unknown }) {
		super(`${message} (offset ${offset})`, options);
		this.offset = offset;
	}
}

export class DepthLimitError extends MalformedTreeError {}

/** Gruppen-/Charakter-Blob kürzer als sein festes Layout */
export class SubCodecError extends SaveToolsError {}

export class EncodeError extends SaveToolsError {
	readonly path: string;

	constructor(message: string, path: string, options?: { cause?: unknown }) {
		super(path ? `${message} at ${path}` : message, options);
		this.path = path;
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}

/** XML-Dokument passt nicht zum erwarteten Aufbau */
export class XmlFormatError extends SaveToolsError {}
