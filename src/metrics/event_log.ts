/**
 * NDJSON sink for detailed-mode request events.
 *
 * Line 1 is a MetaEvent; every following line is one RequestEvent. The sink
 * drains the event channel until it closes. A write failure is logged once
 * and ends the sink; workers are never affected.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import { log } from "../log.ts";
import type { EventChannel } from "../engine/channel.ts";
import type { MetaEvent, RequestEvent } from "./events.ts";

export interface EventLogResult {
  written: number;
  failed: boolean;
}

export async function writeEventLog(
  path: string,
  meta: MetaEvent,
  events: EventChannel<RequestEvent>,
): Promise<EventLogResult> {
  const stream = createWriteStream(path, { encoding: "utf8" });
  const errors: Error[] = [];
  stream.on("error", (e) => errors.push(e));
  let written = 0;

  try {
    await writeLine(stream, JSON.stringify(meta));
    for await (const event of events) {
      if (errors.length > 0) break;
      await writeLine(stream, JSON.stringify(event));
      written++;
    }
  } catch (e) {
    errors.push(e instanceof Error ? e : new Error(String(e)));
  }

  stream.end();
  if (errors.length === 0) await once(stream, "close");

  if (errors.length > 0) {
    log(`event log ${path}: ${errors[0].message}; no further events recorded`);
    return { written, failed: true };
  }
  return { written, failed: false };
}

async function writeLine(stream: WriteStream, line: string): Promise<void> {
  if (!stream.write(line + "\n")) {
    await once(stream, "drain");
  }
}
