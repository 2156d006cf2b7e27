export interface TimeoutHandle {
  signal: AbortSignal;
  /** 是否因逾時（而非外部取消）而中止 */
  timedOut(): boolean;
  clear(): void;
}

/** 建立一個在 timeoutMs 後中止的 signal，並串接外部 signal */
export function createTimeout(timeoutMs: number, parent?: AbortSignal): TimeoutHandle {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    clear: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
