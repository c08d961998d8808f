import type { MarqueeLogEvent, MarqueeLogSink } from "@splash-marquee/core";

export function formatLogEvent(event: MarqueeLogEvent): string {
  let out = `[${event.level}] ${event.message}`;
  if (event.pass !== undefined) out += ` pass=${String(event.pass)}`;
  if (event.width !== undefined && event.height !== undefined) {
    out += ` size=${String(event.width)}x${String(event.height)}`;
  }
  return out;
}

/** Log sink for `--verbose`. Debug events are dropped. */
export function createStreamLogSink(stream: { write(chunk: string): boolean }): MarqueeLogSink {
  return (event) => {
    if (event.level === "debug") return;
    stream.write(`${formatLogEvent(event)}\n`);
  };
}
