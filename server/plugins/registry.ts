/**
 * Host Plugin Registry
 *
 * Central registry of all plugins the host loads.
 */

import { HostPlugin } from './types';

import { plugin as vpsmonitor } from './vpsmonitor';
import { plugin as onebotmsg } from './onebotmsg';

// All registered plugins
export const plugins: HostPlugin[] = [
    vpsmonitor,
    onebotmsg,
];

// Map for O(1) lookup by ID
export const pluginMap = new Map<string, HostPlugin>(
    plugins.map(p => [p.id, p])
);

// Get plugin by ID
export const getPlugin = (id: string): HostPlugin | undefined => {
    return pluginMap.get(id);
};
