// src/index.ts
export { ArchiveFile, withArchive, isArchive } from './core/ArchiveFile.js';
export { ArchiveMember } from './core/ArchiveMember.js';
export type { ArchiveMemberInit } from './core/ArchiveMember.js';
export { ArchiveFormat } from './core/constants.js';
export {
    ArchiveFileError,
    ArchiveFileNotFoundError,
    UnsupportedArchiveFormatError,
    ArchiveMemberError,
    ArchiveMemberNotFoundError,
    ArchiveMemberNotAFileError,
    ArchiveMemberUnsafeError,
    ArchiveMemberDecodeError,
    ArchiveUnknownEncodingError,
    ArchivePasswordError,
    ArchiveReadError,
    ArchiveClosedError,
    ArchiveMemberTypeError,
} from './core/errors.js';
export type { ArchiveErrorCode, ArchiveErrorJSON } from './core/errors.js';
export * from './adapters/index.js';
export type {
    MemberLike,
    ArchiveFileOptions,
    ExtractOptions,
    ExtractAllOptions,
    TextErrorPolicy,
    ReadTextOptions,
} from './Types.js';
