import { EvidenceSet } from '../common/interfaces/rollout.interfaces';
import { describeError } from '../utils/utils';

export const EVIDENCE_LINE_LIMIT = 10;

const ERROR_MARKER = 'error';

// Third-party agents whose log lines mention errors that are never the app's own
const IGNORED_LOG_SOURCES = ['datadog'];

/**
 * A line is evidence when it mentions "error" (any case) and does not come
 * from an ignored source.
 */
export function isEvidenceLine(line: string): boolean {
  const lowered = line.toLowerCase();
  return lowered.includes(ERROR_MARKER) && !IGNORED_LOG_SOURCES.some((source) => lowered.includes(source));
}

/**
 * Scans log lines one at a time and collects distinct evidence lines in the
 * order they appear. Stops pulling input as soon as the limit is reached.
 *
 * A failure while reading ends the scan; what was collected so far is kept
 * and the failure is returned in `readError`.
 */
export async function scanLogLines(
  lines: Iterable<string> | AsyncIterable<string>,
): Promise<EvidenceSet> {
  const seen = new Set<string>();

  try {
    for await (const line of lines) {
      if (!isEvidenceLine(line) || seen.has(line)) continue;

      seen.add(line);
      if (seen.size >= EVIDENCE_LINE_LIMIT) {
        return { lines: [...seen], capped: true };
      }
    }
  } catch (error) {
    return { lines: [...seen], capped: false, readError: describeError(error) };
  }

  return { lines: [...seen], capped: false };
}
