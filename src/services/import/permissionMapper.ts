import { AssetKind } from '../../types';
import { AssetPermission } from '../permissions.service';
import ownerActions from './ownerActions.json';

const OWNER_ACTIONS: Record<AssetKind, string[]> = ownerActions;

export function ownerActionsFor(kind: AssetKind): string[] {
  return [...OWNER_ACTIONS[kind]];
}

export interface PermissionMapping {
  copySource: boolean;
  grantPrincipals: string[];
  remapPrincipal: (principal: string) => string;
}

/**
 * Permissions to put on an imported asset. Principals listed more than once
 * end up with the union of their actions.
 */
export function buildTargetPermissions(
  kind: AssetKind,
  sourcePermissions: AssetPermission[],
  mapping: PermissionMapping,
): AssetPermission[] {
  const merged = new Map<string, string[]>();
  const add = (principal: string, actions: string[]) => {
    const existing = merged.get(principal) || [];
    for (const action of actions) {
      if (!existing.includes(action)) {
        existing.push(action);
      }
    }
    merged.set(principal, existing);
  };

  if (mapping.copySource) {
    for (const permission of sourcePermissions) {
      add(mapping.remapPrincipal(permission.Principal), permission.Actions);
    }
  }
  for (const principal of mapping.grantPrincipals) {
    add(principal, ownerActionsFor(kind));
  }

  return [...merged.entries()]
    .filter(([, actions]) => actions.length > 0)
    .map(([Principal, Actions]) => ({ Principal, Actions }));
}
