import type { GenerateMoreResult } from "@/lib/generation-orchestrator";
import { errorStatus } from "@/lib/http-errors";

type GenerateMore = (sessionId: string, userId: string) => Promise<GenerateMoreResult>;

export type StreamEvent =
  | { event: "start"; data: { sessionId: string } }
  | { event: "progress"; data: GenerateMoreResult & { batch: number } }
  | { event: "complete"; data: { batches: number; generated: number; remaining: number } }
  | { event: "error"; data: { error: string; status: number; retryAfter?: number } };

export function formatSse({ event, data }: StreamEvent): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Runs generate-more batches back to back, emitting one `progress` event per batch, until
 * nothing is left, a batch fails or the client disconnects.
 */
export function generateMoreStream(
  generateMore: GenerateMore,
  sessionId: string,
  userId: string,
  signal?: AbortSignal
): ReadableStream<Uint8Array> {
  const enc = new TextEncoder();
  // Set once the stream is closed by us or cancelled by the reader; the controller rejects writes after that.
  let closed = false;

  return new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (event: StreamEvent) => {
        if (!closed) controller.enqueue(enc.encode(formatSse(event)));
      };
      send({ event: "start", data: { sessionId } });

      let batches = 0;
      let generated = 0;
      let remaining = 0;
      try {
        for (;;) {
          if (closed || signal?.aborted) {
            console.log("[generation-stream] client disconnected", { sessionId, batches });
            break;
          }
          const result = await generateMore(sessionId, userId);
          batches += 1;
          generated += result.generated;
          remaining = result.remaining;
          send({ event: "progress", data: { ...result, batch: batches } });
          if (!result.hasMore || result.generated === 0) break;
        }
        send({ event: "complete", data: { batches, generated, remaining } });
      } catch (err) {
        const { status, body, retryAfter } = errorStatus(err);
        console.error("[generation-stream] batch failed", { sessionId, batches, error: body.error });
        send({ event: "error", data: { error: body.error, status, retryAfter } });
      } finally {
        if (!closed) {
          closed = true;
          controller.close();
        }
      }
    },
    cancel() {
      closed = true;
    },
  });
}
