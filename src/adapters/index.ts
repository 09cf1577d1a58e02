// src/adapters/index.ts
export type { IArchiveAdapter, AdapterOpenOptions } from './IArchiveAdapter.js';
export { BaseArchiveAdapter } from './IArchiveAdapter.js';
export type { AdapterDescriptor } from './ArchiveAdapterFactory.js';
export { ArchiveAdapterFactory, DEFAULT_ADAPTERS, getDefaultFactory, resetDefaultFactory } from './ArchiveAdapterFactory.js';

export { YauzlZipAdapter } from './YauzlZipAdapter.js';
export { TarStreamAdapter } from './TarStreamAdapter.js';
export { SevenZipAdapter } from './SevenZipAdapter.js';
export { UnrarAdapter } from './UnrarAdapter.js';

export { isZipFile, isTarFile, isSevenZipFile, isRarFile } from './detectors.js';
export { resolveMemberName, validateMembers, findMemberName } from './members.js';
export type { TarCompression } from './compression.js';
export { detectCompression } from './compression.js';
