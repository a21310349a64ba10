export const messages = {
	DESTINATION_INVALID: 'Destination must be a directory.',
	NO_READ_PERMISSIONS_PATH: 'No read permissions for "{path}".',
	NO_READ_PERMISSIONS_TYPE: 'No read permissions for {type} path.',
	NO_WRITE_PERMISSIONS_PATH: 'No write permissions for "{path}".',
	NO_WRITE_PERMISSIONS_TYPE: 'No write permissions for {type} path.',
	PATH_DOES_NOT_EXIST: 'The {type} path does not exist.',
	SOURCE_INVALID: 'Source must be a .{extension} file or a directory containing .{extension} files.',

	MAGIC_INVALID: '"{path}" is not a dsPack archive (magic {magic}).',
	HEADER_TRUNCATED: '"{path}" is {size} bytes, too short for a {headerSize}-byte dsPack header.',
	COUNT_TOO_LARGE: 'Header field {field} = {value} exceeds the limit of {limit}.',
	OFFSET_OUT_OF_RANGE: 'Header field {field} = {value} lies outside the file ({size} bytes).',
	REGION_OUT_OF_RANGE: 'The {region} ({start}..{end}) extends past the end of the file ({size} bytes).',
	NAME_OFFSET_OUT_OF_RANGE: 'Name offset {offset} lies outside the name table ({length} bytes).',
	NAME_UNTERMINATED: 'Name at offset {offset} has no NUL terminator before the end of the name table.',
	NAME_UNRESOLVED: 'Invalid name at offset {offset} for {kind} {index}.',
	PARENT_INVALID: 'Invalid parent folder {parent} for {kind} {index}.',
	DATA_OFFSET_OUT_OF_RANGE: 'Data offset {offset} of file {index} lies outside the file ({size} bytes).',
	DATA_OUT_OF_RANGE: 'Data of file {index} ({start}..{end}) extends past the end of the file ({size} bytes).',
	FILE_RANGE_INVALID: 'Invalid {field} {value} for folder {index}.',
	FOLDER_INDEX_INVALID: 'Folder index {index} is outside the folder directory ({count} folders).',
	FOLDER_CYCLE: 'Folder {index} is its own ancestor (parent chain {chain}).',
	CURSOR_OUT_OF_RANGE: 'Read of {length} bytes at {position} passes the end of the buffer ({size} bytes).',
	READ_OUT_OF_RANGE: 'Read of {length} bytes at {offset} passes the end of "{path}" ({size} bytes).',
	SHORT_READ: 'Read {bytesRead} of {length} bytes at {offset} from "{path}".',
	SHORT_WRITE: 'Wrote {bytesWritten} of {length} bytes to "{path}".',
	PATH_ESCAPES_ROOT: '"{path}" resolves outside the output directory.',
	NOT_A_DIRECTORY: '"{path}" exists and is not a directory.',
	ARCHIVE_CLOSED: 'Read from "{path}" after the archive was closed.',
} as const;

export type MessageKey = keyof typeof messages;
