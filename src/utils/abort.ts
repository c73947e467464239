import { TimeoutError } from '@/services/errors';

/**
 * Runs `fn` with a child signal that aborts after `ms` or when `parent` aborts.
 * Rejects with TimeoutError on expiry and with the parent's reason as soon as the parent aborts,
 * whether or not `fn` honours its signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw parent.reason;
  const controller = new AbortController();

  let onParentAbort: (() => void) | undefined;
  const cancelled = new Promise<never>((_, reject) => {
    onParentAbort = () => {
      controller.abort(parent?.reason);
      reject(parent?.reason);
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
  });

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, ms));
    }, ms);
  });

  try {
    return await Promise.race([fn(controller.signal), expiry, cancelled]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) parent?.removeEventListener('abort', onParentAbort);
  }
}

/** An AbortController that follows `parent` as well as its own abort(). */
export function linkedController(parent?: AbortSignal): AbortController {
  const controller = new AbortController();
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else if (parent) {
    parent.addEventListener('abort', () => controller.abort(parent.reason), { once: true });
  }
  return controller;
}
