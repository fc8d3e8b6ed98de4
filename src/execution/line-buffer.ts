import { StringDecoder } from 'node:string_decoder';

export interface LineBuffer {
  write(chunk: Buffer | string): void;
  flush(): void;
}

/**
 * Turns a chunked container output stream into whole lines. Bytes are
 * decoded as UTF-8 across chunk boundaries; the last partial line is kept
 * until more data arrives or flush() is called.
 */
export function createLineBuffer(onLine: (line: string) => void): LineBuffer {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  const emitComplete = (text: string) => {
    const parts = (pending + text).split(/\r?\n/);
    pending = parts.pop() ?? '';
    parts.forEach((part) => onLine(part));
  };

  return {
    write(chunk) {
      emitComplete(typeof chunk === 'string' ? chunk : decoder.write(chunk));
    },
    flush() {
      emitComplete(decoder.end());
      const rest = pending;
      pending = '';
      if (rest.length > 0) onLine(rest);
    },
  };
}
