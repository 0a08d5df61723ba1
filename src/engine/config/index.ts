export { ConfigurationService } from './ConfigurationService';
export type { OperationResult, ConfigurationServiceOptions } from './ConfigurationService';

export { ConfigEvent } from './events';
export type { ConfigEventTag, ConfigChangeDetail, ConfigChangeListener } from './events';

export { createConfigStore } from './configStore';
export type { ConfigSnapshotState, ConfigSnapshotStore } from './configStore';
