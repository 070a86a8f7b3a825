import { COMMIT_ID_PATTERN } from "./commit-id.js";

export const SEGMENTS_DIR = "segments";
export const COMMITS_DIR = "commits";
export const OUTCOMES_DIR = "outcomes";
export const SEQUENCES_DIR = "sequences";
export const CHAINS_DIR = "chains";

const ROOT_LINK = "root";

const SEQUENCE_WIDTH = 12;

const padSequence = (sequence: number): string => String(sequence).padStart(SEQUENCE_WIDTH, "0");

// "." is escaped too so that no component can resolve to "." or "..".
export const encodeComponent = (value: string): string =>
  encodeURIComponent(value).replace(/\./g, "%2E");

export const segmentKey = (device: string, iface: string): string => `${device}\u0000${iface}`;

export const segmentDirectory = (device: string, iface: string): string =>
  `${SEGMENTS_DIR}/${encodeComponent(device)}/${encodeComponent(iface)}`;

export const recordFileName = (sequence: number, commitId: string): string =>
  `${padSequence(sequence)}.${commitId}.json`;

export const commitIndexPath = (commitId: string): string => `${COMMITS_DIR}/${commitId}.json`;

export const outcomePath = (commitId: string): string => `${OUTCOMES_DIR}/${commitId}.json`;

export const sequenceClaimPath = (sequence: number): string => `${SEQUENCES_DIR}/${padSequence(sequence)}`;

export const parseSequenceClaim = (name: string): number | null =>
  /^\d+$/.test(name) ? Number.parseInt(name, 10) : null;

/**
 * The link file naming the single record allowed to follow `parentCommitId`
 * (or the first record, for `null`) in one history segment.
 */
export const chainLinkPath = (device: string, iface: string, parentCommitId: string | null): string =>
  `${CHAINS_DIR}/${encodeComponent(device)}/${encodeComponent(iface)}/${parentCommitId ?? ROOT_LINK}.json`;

export interface SegmentEntry {
  readonly sequence: number;
  readonly commitId: string;
  readonly path: string;
}

const RECORD_FILE = /^(\d+)\.([^.]+)\.json$/;

export const parseRecordFileName = (directory: string, name: string): SegmentEntry | null => {
  const match = RECORD_FILE.exec(name);
  if (!match || !COMMIT_ID_PATTERN.test(match[2])) {
    return null;
  }
  return {
    sequence: Number.parseInt(match[1], 10),
    commitId: match[2],
    path: `${directory}/${name}`,
  };
};

export const isCommitId = (value: string): boolean => COMMIT_ID_PATTERN.test(value);
