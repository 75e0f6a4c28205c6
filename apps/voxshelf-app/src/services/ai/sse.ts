export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
} as const;

/**
 * Encodes one server-sent event. Each line of `data` gets its own `data:`
 * field so that clients rebuild multi-line fragments intact.
 */
export const formatSSE = (data: string, event?: string): string => {
  const fields = data.split(/\r?\n/).map((line) => `data: ${line}`);
  if (event) fields.unshift(`event: ${event}`);
  return `${fields.join('\n')}\n\n`;
};

/** Wraps an async generator of encoded events as a byte stream. */
export const toEventStream = (
  events: AsyncGenerator<string, void, undefined>,
  onCancel?: () => void,
): ReadableStream<Uint8Array> => {
  const encoder = new TextEncoder();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const { done, value } = await events.next();
      if (done) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(value));
    },
    async cancel() {
      onCancel?.();
      await events.return(undefined);
    },
  });
};
