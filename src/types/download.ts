/**
 * Core data model of a download run: parsed links, cookie sources,
 * format candidates, jobs and the run report.
 */

export interface LinkEntry {
  readonly rawInput: string;
  readonly canonicalId: string;
  readonly url?: string; // canonical watch URL, valid entries only
  readonly isValid: boolean;
}

export interface CookieSource {
  kind: 'file' | 'browser';
  location: string; // file path or browser name
  priority: number;
}

export type CookieJar =
  | { kind: 'file'; path: string; description: string }
  | { kind: 'browser'; browser: string; description: string }
  | { kind: 'none'; description: string };

/**
 * One way of asking the site for a video: which player clients to
 * impersonate and whether the run's cookie jar goes along.
 */
export interface DownloadStrategy {
  name: string;
  playerClients: string[];
  useCookies: boolean;
}

export interface ClientProfile {
  cookieJar: CookieJar;
  playerClients: string[];
}

// ============================================================================
// Formats
// ============================================================================

interface FormatCandidateBase {
  formatId: string;
  container: string;
  resolutionRank: number; // frame height, 0 for audio
  bitrate: number; // kbps, 0 when unknown
  protocol: string;
  hasDrm: boolean;
}

export interface CombinedCandidate extends FormatCandidateBase {
  kind: 'combined';
  hasVideo: true;
  hasAudio: true;
}

export interface VideoOnlyCandidate extends FormatCandidateBase {
  kind: 'video-only';
  hasVideo: true;
  hasAudio: false;
}

export interface AudioOnlyCandidate extends FormatCandidateBase {
  kind: 'audio-only';
  hasVideo: false;
  hasAudio: true;
}

export type FormatCandidate =
  | CombinedCandidate
  | VideoOnlyCandidate
  | AudioOnlyCandidate;

export type FormatSelection =
  | {
      mode: 'combined';
      video: CombinedCandidate;
      formatSpec: string;
      label: string;
    }
  | {
      mode: 'merge';
      video: VideoOnlyCandidate;
      audio: AudioOnlyCandidate;
      formatSpec: string;
      label: string;
    }
  | {
      // no format list to choose from; the engine picks
      mode: 'generic';
      formatSpec: string;
      label: string;
    };

export type SelectionFailureReason = 'no-formats' | 'no-acceptable-format';

export interface SelectionFailure {
  reason: SelectionFailureReason;
  message: string;
}

export type SelectionResult =
  | { ok: true; selection: FormatSelection; title: string }
  | { ok: false; failure: SelectionFailure };

// ============================================================================
// Jobs & outcomes
// ============================================================================

export interface DownloadJob {
  id: string;
  index: number;
  link: LinkEntry;
  title: string;
  selection: FormatSelection;
  excludedFormatIds: string[];
  cookieJar: CookieJar;
  destinationPath: string;
  attemptCount: number;
  strategyIndex: number;
}

export type DownloadOutcome =
  | {
      status: 'success';
      outputPath: string;
      filesize: number;
      warnings: string[];
      attempts: number;
      formatLabel: string;
      strategy: string;
    }
  | {
      status: 'failed';
      reason: string;
      detail: string;
      attempts: number;
    };

export interface RunReportEntry {
  index: number;
  link: LinkEntry;
  outcome: 'success' | 'failed';
  reason?: string;
  detail?: string;
  title?: string;
  outputPath?: string;
  filesize?: number;
  formatLabel?: string;
  strategy?: string;
  attempts: number;
  warnings: string[];
}

export interface RunReport {
  entries: RunReportEntry[];
  cookieSource: string;
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
}
