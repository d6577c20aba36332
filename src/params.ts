import type { RunParams } from './types.js';

const NODE_PREFIX = 'node_';
const MSGSIZE_PREFIX = 'msgsize_';
const MSGSIZE_SUFFIX = 'MiB';

function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

/**
 * Reads node count and message size from a result directory laid out as
 * `.../node_<N>/msgsize_<S>MiB[/...]`. Later segments win; segments that do
 * not parse leave the previous value in place.
 */
export function extractRunParams(resultDir: string): RunParams {
  const segments = resultDir.replace(/^\/+|\/+$/g, '').split('/');
  const params: RunParams = { nodeCount: null, msgsize: null };

  for (const segment of segments) {
    if (segment.startsWith(NODE_PREFIX)) {
      const value = parseInteger(segment.slice(NODE_PREFIX.length));
      if (value !== null) params.nodeCount = value;
    } else if (segment.startsWith(MSGSIZE_PREFIX)) {
      let rest = segment.slice(MSGSIZE_PREFIX.length);
      if (rest.endsWith(MSGSIZE_SUFFIX)) rest = rest.slice(0, -MSGSIZE_SUFFIX.length);
      const value = parseInteger(rest);
      if (value !== null) params.msgsize = value;
    }
  }

  return params;
}
