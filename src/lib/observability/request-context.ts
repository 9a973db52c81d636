import { randomUUID } from "crypto";
import { AsyncLocalStorage } from "async_hooks";

export interface RequestScope {
  requestId: string;
  actorId?: string;
  /** Epoch millis after which store work should give up. */
  deadline?: number;
}

const scopes = new AsyncLocalStorage<RequestScope>();

export function withRequestContext<T>(
  fn: () => Promise<T>,
  init: { requestId?: string; deadline?: number } = {},
): Promise<T> {
  const scope: RequestScope = {
    requestId: init.requestId ?? randomUUID(),
    deadline: init.deadline,
  };
  return scopes.run(scope, fn);
}

export function getRequestId(): string | undefined {
  return scopes.getStore()?.requestId;
}

export function getActorId(): string | undefined {
  return scopes.getStore()?.actorId;
}

// Called once the bearer token resolves, so later log lines carry the caller.
export function setContextActor(actorId: string): void {
  const scope = scopes.getStore();
  if (scope) scope.actorId = actorId;
}

export function getRemainingTimeMs(now: number = Date.now()): number | undefined {
  const deadline = scopes.getStore()?.deadline;
  return deadline === undefined ? undefined : deadline - now;
}
