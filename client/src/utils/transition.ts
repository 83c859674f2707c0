/**
 * Returns a promise that will resolve after either the element's transition
 * ends (or is cancelled by a newer one), the max delay of time is reached or
 * the given signal is aborted.
 *
 * Only a transition that runs after the call counts, so end or cancel events
 * left over from an earlier transition do not resolve the promise. When
 * `propertyName` is given, transitions of other properties are ignored.
 * If `maxDelay` is provided as zero or not a finite number, the promise
 * resolves immediately.
 */
export const transition = (
  element: HTMLElement,
  {
    maxDelay = 350,
    propertyName,
    signal,
  }: { maxDelay?: number; propertyName?: string; signal?: AbortSignal } = {},
) =>
  new Promise<TransitionEvent | null>((resolve) => {
    if (!Number.isFinite(maxDelay) || maxDelay <= 0 || signal?.aborted) {
      resolve(null);
      return;
    }

    let hasStarted = false;
    let timer: number | undefined;

    const isOwnTransition = (event: TransitionEvent) =>
      event.target === element &&
      (!propertyName || event.propertyName === propertyName);

    const start = (event: TransitionEvent) => {
      if (isOwnTransition(event)) hasStarted = true;
    };

    const finish = (event: TransitionEvent | null) => {
      if (event && !(hasStarted && isOwnTransition(event))) return;
      window.clearTimeout(timer);
      element.removeEventListener('transitionrun', start);
      element.removeEventListener('transitionend', finish);
      element.removeEventListener('transitioncancel', finish);
      signal?.removeEventListener('abort', abort);
      resolve(event);
    };

    const abort = () => finish(null);

    element.addEventListener('transitionrun', start);
    element.addEventListener('transitionend', finish);
    element.addEventListener('transitioncancel', finish);
    signal?.addEventListener('abort', abort);
    timer = window.setTimeout(abort, maxDelay);
  });
