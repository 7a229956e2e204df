export type { Workspace } from './workspace.js';
export type { PlayerPageInput, ShareResult } from './share.js';
