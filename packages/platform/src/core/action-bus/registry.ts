/**
 * Action Registry
 *
 * Central registry of all actions in the system.
 * The domain registers its resource actions here at startup.
 * The REST adapter reads this to generate routes.
 */

import type { AnyActionDefinition } from "@issuedesk/contracts";

/** All registered actions, keyed by action ID */
const actions = new Map<string, AnyActionDefinition>();

/**
 * Registers an action. Throws if an action with the same ID already exists.
 */
export function registerAction(action: AnyActionDefinition) {
  if (actions.has(action.id)) {
    throw new Error(
      `Action "${action.id}" is already registered. Action IDs must be unique.`
    );
  }
  actions.set(action.id, action);
}

/**
 * Registers multiple actions at once.
 */
export function registerActions(actionList: readonly AnyActionDefinition[]) {
  for (const action of actionList) {
    registerAction(action);
  }
}

/**
 * Retrieves an action by ID.
 */
export function getAction(id: string): AnyActionDefinition | undefined {
  return actions.get(id);
}

/**
 * Returns all registered actions.
 */
export function getAllActions(): AnyActionDefinition[] {
  return Array.from(actions.values());
}

/**
 * Clears all registered actions. Used for testing.
 */
export function clearActionRegistry() {
  actions.clear();
}
