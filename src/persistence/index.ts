// ─── Public API ───

export { GridDatabase, openDatabase } from './db';
export type { PresetRecord, NewPreset } from './db';
