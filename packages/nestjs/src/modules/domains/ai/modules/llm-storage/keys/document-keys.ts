// Firestore document ids may not contain "/"
const KEY_SEPARATOR = "__";

export function sanitize(segment: string): string {
  return segment.replaceAll("/", "_");
}

export function checkpointKey(
  threadId: string,
  checkpointNs: string,
  checkpointId: string,
): string {
  return [sanitize(threadId), sanitize(checkpointNs), checkpointId].join(
    KEY_SEPARATOR,
  );
}

export function blobKey(
  threadId: string,
  checkpointNs: string,
  channel: string,
  version: string | number,
): string {
  return [
    sanitize(threadId),
    sanitize(checkpointNs),
    sanitize(channel),
    String(version),
  ].join(KEY_SEPARATOR);
}

export function writeKey(
  threadId: string,
  checkpointNs: string,
  checkpointId: string,
  taskId: string,
  idx: number,
): string {
  return [
    sanitize(threadId),
    sanitize(checkpointNs),
    checkpointId,
    sanitize(taskId),
    String(idx),
  ].join(KEY_SEPARATOR);
}
