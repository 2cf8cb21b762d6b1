export function combineSignals(...signals: (AbortSignal | undefined)[]): AbortSignal {
  const active = signals.filter((s): s is AbortSignal => s !== undefined);
  if (active.length === 0) {
    const ac = new AbortController();
    return ac.signal;
  }
  // If any already aborted, reuse it
  for (const s of active) if (s.aborted) return s;
  const ctrl = new AbortController();
  const onAbort = (event: Event) => {
    const source = event.target instanceof AbortSignal ? event.target.reason : 'aborted';
    ctrl.abort(source);
  };
  for (const s of active) s.addEventListener('abort', onAbort, { once: true });
  return ctrl.signal;
}

export function isTimeoutReason(reason: unknown): boolean {
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}
