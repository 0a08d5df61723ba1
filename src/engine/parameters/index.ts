export type {
  ComponentKind,
  LoadKind,
  ParameterDefinition,
  ParameterDescriptor,
  ParameterOverride,
  ParameterValues,
  ConfigurationTable,
} from './types';

export { COMPONENT_KINDS, isComponentKind } from './types';
export { PARAMETER_CATALOG, catalogFor } from './catalog';
export { resolveEffective, checkRange, formatRange, describeDefinition, paramKey } from './resolve';

export { ParameterStore } from './ParameterStore';
export type { OverrideWrite, ParameterStoreOptions } from './ParameterStore';
