import { AsyncLocalStorage } from "node:async_hooks";

export interface UserContext {
  userId: number;
  /** IANA zone used to decide what "today" means for this user. */
  timezone: string;
}

const userStore = new AsyncLocalStorage<UserContext>();

export function getUserContext(): UserContext {
  const store = userStore.getStore();
  if (!store) {
    throw new Error("getUserContext() called outside of auth context");
  }
  return store;
}

export function getUserId(): number {
  return getUserContext().userId;
}

export function runWithUser<T>(context: UserContext, fn: () => T): T {
  return userStore.run(context, fn);
}
