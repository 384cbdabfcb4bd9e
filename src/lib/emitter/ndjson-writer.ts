/**
 * NDJSON Writer - Transform stream that converts records to NDJSON
 */

import { Transform, type TransformCallback } from "stream";

export class NDJSONWriter extends Transform {
  constructor() {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      this.push(JSON.stringify(chunk) + "\n");
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

export function createNDJSONWriter(): Transform {
  return new NDJSONWriter();
}
