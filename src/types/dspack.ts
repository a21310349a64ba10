export type ByteOrder = 'LE' | 'BE';

/*
 * char8  | 0x4 | magic 1             | "mgf " (LE) or " fgm" (BE)
 * uint8  | 0x4 | magic 2             | 08 01 5A 5A (LE) or 5A 5A 01 08 (BE)
 * uint32 | 0x1 | reserved            | ignored
 * uint32 | 0x1 | file count          | [aa]
 * uint32 | 0x1 | file dir length     |
 * uint32 | 0x1 | file dir offset     | FileRecord[aa]
 * uint32 | 0x1 | folder count        | [ab]
 * uint32 | 0x1 | folder dir length   |
 * uint32 | 0x1 | folder dir offset   | FolderRecord[ab]
 * uint32 | 0x1 | name table length   |
 * uint32 | 0x1 | name table offset   | NUL-terminated strings
 */
export interface Header {
	byteOrder: ByteOrder;
	numFiles: number;
	fileDirLength: number;
	fileDirOffset: number;
	numFolders: number;
	folderDirLength: number;
	folderDirOffset: number;
	namesDirLength: number;
	namesDirOffset: number;
}

/*
 * uint32 | 0x1 | name offset        | into name table
 * int32  | 0x1 | parent folder      | -1 for archive root
 * uint32 | 0x1 | decompressed size  |
 * uint32 | 0x1 | compressed size    | == decompressed: stored, < decompressed: MiniPack
 * uint32 | 0x1 | unknown            |
 * uint32 | 0x1 | data offset        | relative to start of file
 */
export interface FileEntry {
	readonly name: string;
	readonly parentFolder: number;
	readonly decompressedSize: number;
	readonly compressedSize: number;
	readonly unknown: number;
	readonly dataOffset: number;
}

/*
 * uint32 | 0x1 | name offset      | into name table
 * int32  | 0x1 | parent folder    | -1 for archive root
 * int32  | 0x1 | last subfolder   | -1 for none
 * int32  | 0x1 | first subfolder  | -1 for none
 * int32  | 0x1 | first file       | -1 for none
 * int32  | 0x1 | last file        | -1 for none
 */
export interface FolderEntry {
	readonly name: string;
	readonly parentFolder: number;
	readonly lastSubfolder: number;
	readonly firstSubfolder: number;
	readonly firstFile: number;
	readonly lastFile: number;
}

export interface ByteSource {
	readonly path: string;
	readonly size: number;
	read(offset: number, length: number): Promise<Buffer>;
	close(): Promise<void>;
}

export interface FileSink {
	/** Creates `segments` below the sink root; existing directories are not an error. */
	mkdir(segments: readonly string[]): Promise<void>;
	write(segments: readonly string[], data: Buffer): Promise<void>;
}

export type LogLine = (line: string) => void;
