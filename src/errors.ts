export type SnipsError =
	| { kind: "FileNotFound"; path: string }
	| { kind: "Io"; path: string; message: string }
	| { kind: "InvalidMarker"; file: string; line: number; content: string }
	| { kind: "MissingCodeFence"; file: string; line: number }
	| { kind: "RegionNotFound"; file: string; name: string; available: string[] }
	| { kind: "UnterminatedRegion"; file: string; name: string }
	| { kind: "NoDocuments"; dir: string };

export type Result<T, E = SnipsError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err(error: SnipsError): Result<never> {
	return { ok: false, error };
}

const EXPECTED_MARKER =
	"Expected format: <!-- snips: path/to/file.ext --> or <!-- snips: path/to/file.ext#region-name -->";

export function formatError(error: SnipsError): string {
	switch (error.kind) {
		case "FileNotFound":
			return `file not found: ${error.path}`;
		case "Io":
			return `IO error: ${error.path}: ${error.message}`;
		case "InvalidMarker":
			return `invalid marker format in ${error.file}:${error.line}\n  ${error.content}\n  ${EXPECTED_MARKER}`;
		case "MissingCodeFence":
			return `marker not followed by code fence: ${error.file}:${error.line}`;
		case "RegionNotFound": {
			const available = error.available.length > 0 ? error.available.join(", ") : "none";
			return `region \`${error.name}\` not found in ${error.file}\nAvailable regions: ${available}`;
		}
		case "UnterminatedRegion":
			return `unterminated region \`${error.name}\` in ${error.file}`;
		case "NoDocuments":
			return `no documents found in ${error.dir}`;
	}
}

/** Map a thrown fs error onto FileNotFound or Io. */
export function fromFsError(path: string, cause: unknown): SnipsError {
	if (cause instanceof Error && "code" in cause && cause.code === "ENOENT") {
		return { kind: "FileNotFound", path };
	}
	return { kind: "Io", path, message: cause instanceof Error ? cause.message : String(cause) };
}
