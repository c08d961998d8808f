export type MarqueeLogLevel = "debug" | "info" | "warn" | "error";

export type MarqueeLogEvent = Readonly<{
  level: MarqueeLogLevel;
  message: string;
  pass?: number;
  width?: number;
  height?: number;
}>;

export type MarqueeLogSink = (event: MarqueeLogEvent) => void;

export function makeLogSink(log: MarqueeLogSink | undefined): MarqueeLogSink {
  if (typeof log === "function") return log;
  return () => {};
}
