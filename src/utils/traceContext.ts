import { AsyncLocalStorage } from "async_hooks";

/** Fields stamped onto every trace line written while a skill runs. */
export type TraceContext = {
  payloadId?: string;
  skill?: string;
};

const storage = new AsyncLocalStorage<TraceContext>();

/** Runs `fn` with `ctx` layered over any enclosing context; unset fields are inherited. */
export function withTraceContext<T>(ctx: TraceContext, fn: () => T): T {
  const parent = storage.getStore();
  const merged: TraceContext = { ...parent };
  if (ctx.payloadId) merged.payloadId = ctx.payloadId;
  if (ctx.skill) merged.skill = ctx.skill;
  return storage.run(merged, fn);
}

export function getTraceContext(): TraceContext {
  return storage.getStore() ?? {};
}
