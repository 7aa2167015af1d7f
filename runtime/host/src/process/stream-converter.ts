import type { Readable } from 'node:stream';

/**
 * Convert a Node.js Readable to a Web ReadableStream of UTF-8 text.
 * Decoding happens on the Node side so multi-byte characters split across
 * chunks arrive whole.
 */
export function nodeStreamToWebStream(nodeStream: Readable): ReadableStream<string> {
  nodeStream.setEncoding('utf8');
  return new ReadableStream<string>({
    start(controller) {
      nodeStream.on('data', (chunk: string | Buffer) => {
        controller.enqueue(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      });
      nodeStream.on('end', () => {
        controller.close();
      });
      nodeStream.on('error', (err) => {
        controller.error(err);
      });
    },
    cancel() {
      nodeStream.destroy();
    },
  });
}
