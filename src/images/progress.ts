import type Docker from "dockerode";
import { z } from "zod";

/** `step` marks orchestration milestones; the others carry tool output. */
export type ProgressPhase = "step" | "fetch" | "git" | "pull" | "build";

export interface ProgressEvent {
  phase: ProgressPhase;
  message: string;
}

/**
 * A long-running operation: yields progress events as they happen and
 * returns its result when done. The consumer drives it, so a quiet consumer
 * can drop events without the producer buffering them.
 */
export type Progress<T> = AsyncGenerator<ProgressEvent, T, void>;

/** One JSON line of a daemon pull or build stream. Unknown keys are kept. */
const daemonFrameSchema = z
  .object({
    stream: z.string().optional(),
    status: z.string().optional(),
    progress: z.string().optional(),
    id: z.string().optional(),
    error: z.string().optional(),
    errorDetail: z.object({ message: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();
export type DaemonFrame = z.infer<typeof daemonFrameSchema>;

/**
 * Follow a daemon pull or build stream through dockerode's progress parser,
 * yielding each frame as it arrives. Ends when the stream does; a stream
 * error is rethrown. Error frames are yielded like any other.
 */
export async function* followDaemonProgress(
  docker: Docker,
  stream: NodeJS.ReadableStream,
): AsyncGenerator<DaemonFrame, void, void> {
  const pending: DaemonFrame[] = [];
  const state: { done: boolean; error: Error | null } = { done: false, error: null };
  let wake: (() => void) | undefined;
  const notify = () => {
    wake?.();
    wake = undefined;
  };

  docker.modem.followProgress(
    stream,
    (err) => {
      state.error = err;
      state.done = true;
      notify();
    },
    (event: unknown) => {
      const parsed = daemonFrameSchema.safeParse(event);
      if (parsed.success) pending.push(parsed.data);
      notify();
    },
  );

  for (;;) {
    const frame = pending.shift();
    if (frame) {
      yield frame;
      continue;
    }
    if (state.error) throw state.error;
    if (state.done) return;
    await new Promise<void>((resolve) => {
      wake = resolve;
    });
  }
}

/** The error a frame reports, if it is an error frame. */
export function frameError(frame: DaemonFrame): string | undefined {
  return frame.errorDetail?.message ?? frame.error;
}

/** Human-readable text of a frame, or undefined if it carries none. */
export function frameMessage(frame: DaemonFrame): string | undefined {
  if (frame.stream !== undefined) {
    const text = frame.stream.trimEnd();
    return text || undefined;
  }
  if (frame.status !== undefined) {
    const parts = [frame.id ? `${frame.id}: ${frame.status}` : frame.status];
    if (frame.progress) parts.push(frame.progress);
    return parts.join(" ");
  }
  return undefined;
}

/** Run a progress generator to completion, handing each event to `onEvent`. */
export async function drain<T>(progress: Progress<T>, onEvent: (event: ProgressEvent) => void): Promise<T> {
  for (;;) {
    const next = await progress.next();
    if (next.done) return next.value;
    onEvent(next.value);
  }
}
