import type { Primitive } from 'type-fest';

import { messages } from './messages.js';
import type { MessageKey } from './messages.js';

type Tokens<S extends string> =
	S extends `${string}{${infer Token}}${infer Rest}`
	? Token | Tokens<Rest>
	: never;

type ReplacementArgs<S extends string> =
	S extends `${string}{${string}}${string}`
	? [replacementObject: Record<Tokens<S>, Primitive>]
	: [];

const formatMessage = (template: string, ...[replacementObject = {}]: [Record<string, Primitive>?]) =>
	template.replace(/{([a-z\d]+)}/gi, (token: string, key: string) => key in replacementObject ? String(replacementObject[key]) : token);

export class CustomError extends Error {}
export class NonFatalError<MSG extends MessageKey> extends CustomError {
	constructor(readonly messageKey: MSG, ...replacementArgs: ReplacementArgs<typeof messages[MSG]>) {
		super(formatMessage(messages[messageKey], ...replacementArgs));
	}
}

/////////////////
// ARCHIVE ERRORS

export class ArchiveError<MSG extends MessageKey> extends NonFatalError<MSG> {}

// Unrecognised magic; nothing in the file can be trusted.
export class FormatError<MSG extends MessageKey> extends ArchiveError<MSG> {}
export class BoundsError<MSG extends MessageKey> extends ArchiveError<MSG> {}
export class IntegrityError<MSG extends MessageKey> extends ArchiveError<MSG> {}
export class CorruptArchiveError<MSG extends MessageKey> extends IntegrityError<MSG> {}
// Only ever fatal for the file being read or written.
export class ArchiveIOError<MSG extends MessageKey> extends ArchiveError<MSG> {}
