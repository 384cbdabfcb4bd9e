/**
 * JSON array writer - Transform stream that converts a record stream to a JSON array
 */

import { Transform, type TransformCallback } from "stream";
import { isJsonObject } from "../../types/data-model.js";

/**
 * Writes [ at start, comma-separated records, and ] at end
 */
export class JSONWriter extends Transform {
  private isFirstItem = true;

  constructor() {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  _construct(callback: (error?: Error | null) => void): void {
    this.push("[\n");
    callback();
  }

  _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    if (!isJsonObject(chunk)) {
      callback(new TypeError("JSONWriter accepts JSON-representable records only"));
      return;
    }

    try {
      const prefix = this.isFirstItem ? "  " : ",\n  ";
      this.isFirstItem = false;
      this.push(prefix + JSON.stringify(chunk));
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    this.push(this.isFirstItem ? "]\n" : "\n]\n");
    callback();
  }
}

export function createJSONWriter(): Transform {
  return new JSONWriter();
}
