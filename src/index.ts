export { DsPackArchive, openArchive, withArchive } from './dspack/archive.js';
export { parseHeader, detectByteOrder, HEADER_SIZE, RECORD_SIZE, MAX_ENTRY_COUNT } from './dspack/header.js';
export { NameTable } from './dspack/name-table.js';
export { readFileEntries, readFolderEntries } from './dspack/directory.js';
export { FolderPathResolver } from './dspack/path-resolver.js';
export { decompressMiniPack, describeFailure } from './dspack/minipack.js';
export type { MiniPackResult, DecompressionFailure, DecompressionFailureKind } from './dspack/minipack.js';
export { analyzeArchive, formatSummary } from './dspack/summary.js';
export type { ArchiveSummary, FolderSummary, FileSample } from './dspack/summary.js';
export { extractArchive, classifyEntry, insertMarker, COMPRESSED_MARKER } from './dspack/extract.js';
export type { ExtractionResult, ExtractionFailure, ExtractOptions, PayloadKind } from './dspack/extract.js';

export { BinaryCursor } from './util/binary-cursor.js';
export { DirectorySink } from './util/directory-sink.js';
export { ReadFile } from './util/file-handle.js';

export {
	CustomError,
	NonFatalError,
	ArchiveError,
	FormatError,
	BoundsError,
	IntegrityError,
	CorruptArchiveError,
	ArchiveIOError,
} from './errors.js';

export type * from './types/dspack.js';
