/**
 * Configuration change events.
 *
 * Delivered synchronously, in registration order, after the write they
 * describe has been persisted.
 */

import type { ComponentKind } from '../parameters/types';

export const ConfigEvent = {
    ConfigChanged: 'config_changed',
    PresetSaved: 'instance_saved',
    PresetDeleted: 'instance_deleted',
} as const;

export type ConfigEventTag = (typeof ConfigEvent)[keyof typeof ConfigEvent];

export interface ConfigChangeDetail {
    kind?: ComponentKind;
    parameterName?: string;
    presetId?: number;
}

export type ConfigChangeListener = (tag: ConfigEventTag, detail: ConfigChangeDetail) => void;
