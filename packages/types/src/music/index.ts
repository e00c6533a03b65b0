export type { IMusicLookupClient } from './IMusicLookupClient.js';
export type { ITrackDescriptor } from './ITrackDescriptor.js';
