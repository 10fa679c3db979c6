/**
 * Command encoding for the Miniserver
 *
 * Resolves the wire address of a control and builds `sps/io` paths.
 */

import { ENDPOINTS, PROTOCOL_CONFIG } from '../MiniserverProtocol.mjs';
import type { Control } from '../types.mjs';

/** Values a command may carry */
export type CommandValue = string | number | boolean;

/**
 * Resolve the address a command or state read is sent to
 *
 * 1. A uuid that already contains `/` is used verbatim
 * 2. `details.parent_uuid` + `details.subcontrol_id` form `parent/sub`
 * 3. A string `states.action` reference
 * 4. The uuid itself
 */
export function resolveAddress(uuid: string, control?: Control): string {
  if (uuid.includes(PROTOCOL_CONFIG.COMPOSITE_SEPARATOR)) {
    return uuid;
  }

  if (control) {
    const { parent_uuid: parentUuid, subcontrol_id: subId } = control.details;
    const hasSubId = (typeof subId === 'string' && subId !== '') || typeof subId === 'number';
    if (typeof parentUuid === 'string' && parentUuid && hasSubId) {
      return `${parentUuid}${PROTOCOL_CONFIG.COMPOSITE_SEPARATOR}${subId}`;
    }

    const action = control.states.action;
    if (typeof action === 'string' && action) {
      return action;
    }
  }

  return uuid;
}

/**
 * `sps/io/{address}/{command}` or `sps/io/{address}/{command}/{value}`
 */
export function buildCommandPath(
  address: string,
  command: string,
  value?: CommandValue | null
): string {
  const base = `sps/io/${address}/${encodeURIComponent(command)}`;
  if (value === undefined || value === null) {
    return base;
  }
  return `${base}/${encodeURIComponent(String(value))}`;
}

/**
 * `sps/io/{address}`, the read path for a control's current value
 */
export function buildStatePath(address: string): string {
  return `sps/io/${address}`;
}

/**
 * Absolute request path for a jdev command
 */
export function toRequestPath(commandPath: string): string {
  return `${ENDPOINTS.COMMAND_PREFIX}${commandPath}`;
}
