import { GenerationError } from './errors';

/**
 * Runs `task` with a signal that aborts after `ms` or when `parent` aborts.
 * Either way the returned promise rejects with a GenerationError right away,
 * without waiting for the task to notice the signal.
 */
export async function withDeadline<R>(
  ms: number,
  parent: AbortSignal | undefined,
  label: string,
  task: (signal: AbortSignal) => Promise<R>
): Promise<R> {
  if (parent?.aborted) throw new GenerationError('aborted', `${label} aborted`, { cause: parent.reason });

  const controller = new AbortController();
  let failure: GenerationError | null = null;
  const stopped = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(failure), { once: true });
  });
  const onParentAbort = () => {
    failure = new GenerationError('aborted', `${label} aborted`, { cause: parent?.reason });
    controller.abort(failure);
  };
  const timer = setTimeout(() => {
    failure = new GenerationError('timeout', `${label} timed out after ${ms}ms`);
    controller.abort(failure);
  }, ms);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([task(controller.signal), stopped]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
