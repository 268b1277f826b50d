let requestCounter = 0;

/**
 * Returns the next request-sequence id. Used only to correlate log lines.
 */
export function nextRequestId(): number {
  requestCounter += 1;
  return requestCounter;
}
