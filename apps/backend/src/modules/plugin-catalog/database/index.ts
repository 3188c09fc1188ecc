export type { IPluginDocument } from './IPluginDocument.js';
