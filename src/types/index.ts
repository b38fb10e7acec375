/**
 * Shared types
 */

export type {
  CdpTarget,
  CdpParams,
  CdpCommand,
  CdpProtocolError,
  CdpResponse,
  ConnectionState,
  RemoteObject,
  EvaluationResult,
  ScreenshotFormat,
  ScreenshotOptions,
  WaitForSelectorOptions,
} from './cdp.js';

export type {
  Candidate,
  ScoredCandidate,
  NetworkFilter,
  CandidateSearchOptions,
  SearchResult,
  SearchContext,
  PageDiagnostics,
} from './candidates.js';
