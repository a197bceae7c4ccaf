/** A readable stream that may be attached to a terminal. */
export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Read the whole of stdin as UTF-8. Resolves to '' when stdin is a TTY.
 */
export async function readStdin(stream: InputStream = process.stdin): Promise<string> {
  if (stream.isTTY) return '';

  stream.setEncoding('utf-8');
  let data = '';
  for await (const chunk of stream) {
    data += String(chunk);
  }
  return data;
}
