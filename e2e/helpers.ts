/**
 * Simulate a message read off a queue: untrusted JSON with no static type.
 */
export function dequeue(text: string) {
  return JSON.parse(text);
}
