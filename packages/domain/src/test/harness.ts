/**
 * Test Harness
 *
 * Runs domain actions through the real Action Bus against in-memory
 * stores, building each request the way the REST adapter would.
 */

import type { User } from "@issuedesk/contracts";
import {
  buildRequestContext,
  clearActionRegistry,
  createActionServices,
  dispatch,
  getAction,
  MemoryCacheStore,
  MemoryDataStore,
  registerActions,
  type ActionResult,
  type ActionServices,
} from "@issuedesk/platform";
import { actions } from "../index.js";

export interface CallOptions {
  as?: User | null;
  params?: Record<string, string>;
  body?: Record<string, unknown>;
  page?: number;
}

export interface Harness {
  store: MemoryDataStore;
  cacheStore: MemoryCacheStore;
  services: ActionServices;
  call(actionId: string, options?: CallOptions): Promise<ActionResult>;
  /** Calls the action and returns its data, failing the test on an error result */
  ok(actionId: string, options?: CallOptions): Promise<unknown>;
  /** Runs a create action and returns the new object's id */
  create(actionId: string, options?: CallOptions): Promise<string>;
  user(username: string, extra?: Partial<Pick<User, "age" | "canDataBeShared">>): Promise<User>;
}

export function createHarness(): Harness {
  clearActionRegistry();
  registerActions(actions);

  const store = new MemoryDataStore();
  const cacheStore = new MemoryCacheStore();
  const services = createActionServices({ store, cacheStore, pageSize: 10 });

  const call = async (actionId: string, options: CallOptions = {}): Promise<ActionResult> => {
    const action = getAction(actionId);
    if (!action) {
      throw new Error(`Unknown action ${actionId}`);
    }
    const actor = options.as ? { userId: options.as.id, username: options.as.username } : null;
    const request = buildRequestContext(
      {
        actor,
        params: options.params ?? {},
        body: options.body ?? {},
        query: options.page ? { page: String(options.page) } : {},
      },
      { action: action.kind, resource: action.resource }
    );
    return dispatch(actionId, request, services);
  };

  const ok = async (actionId: string, options?: CallOptions): Promise<unknown> => {
    const result = await call(actionId, options);
    if (!result.success) {
      throw new Error(`${actionId} failed: ${result.error}`);
    }
    return result.data;
  };

  return {
    store,
    cacheStore,
    services,
    call,
    ok,
    async create(actionId, options) {
      const data = await ok(actionId, options);
      if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "string") {
        return data.id;
      }
      throw new Error(`${actionId} returned no id`);
    },
    user: (username, extra = {}) =>
      store.users.create({ username, email: `${username}@example.com`, ...extra }),
  };
}
