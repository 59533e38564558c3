// ============================================
// Scrobbles
// ============================================

/**
 * A single completed listen, normalized from Last.fm's recent tracks.
 * `timestamp` is a Unix time in seconds.
 */
export interface Scrobble {
  artist: string;
  name: string;
  album: string;
  timestamp: number;
  image?: string;
}

/** A scrobble whose track duration (seconds) has been resolved. */
export interface ResolvedScrobble extends Scrobble {
  duration: number;
}

// ============================================
// Listening time
// ============================================

/** Invariant: totalSeconds === hours * 3600 + minutes * 60 + seconds */
export interface ListeningTime {
  hours: number;
  minutes: number;
  seconds: number;
  totalSeconds: number;
}

export interface DailyListeningStats {
  totalTime: ListeningTime;
  scrobbleCount: number;
}

export interface DailyListeningResult {
  scrobbles: ResolvedScrobble[];
  totalTime: ListeningTime;
}

export interface WeeklyListeningDay {
  /** English weekday name, e.g. "Monday" */
  dayName: string;
  /** YYYY-MM-DD */
  date: string;
  /** MM/DD */
  shortDate: string;
  totalTime: ListeningTime;
  scrobbleCount: number;
  totalSeconds: number;
  hours: number;
  minutes: number;
  /** Served from the daily cache; no per-track detail is available */
  fromCache: boolean;
}

export interface WeeklyTotals {
  hours: number;
  minutes: number;
  seconds: number;
  totalSeconds: number;
  totalTracks: number;
}

// ============================================
// API responses
// ============================================

export interface PaginationInfo {
  currentPage: number;
  perPage: number;
  pageCount: number;
  totalScrobbles: number;
}

export interface DisplayScrobble extends ResolvedScrobble {
  /** Local time of day, HH:MM:SS */
  time: string;
}

export interface DailyListeningResponse {
  username: string;
  date: string;
  /** MM-DD-YYYY */
  displayDate: string;
  scrobbles: DisplayScrobble[];
  totalTime: ListeningTime;
  pagination: PaginationInfo;
  message?: string;
}

export interface WeeklyListeningResponse {
  username: string;
  startDate: string;
  days: WeeklyListeningDay[];
  totals: WeeklyTotals | null;
  message?: string;
}

export interface CacheStatsResponse {
  trackDurations: number;
  dailyEntries: number;
}
