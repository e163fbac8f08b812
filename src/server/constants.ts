/**
 * Project-specific constants
 */

// Server configuration
export const DEFAULT_PORT = 9090

// Intra API
export const DEFAULT_API_URL = 'https://api.intra.42.fr'
export const PAGE_SIZE = 100
export const MAX_PAGES = 10_000
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 7200
export const TOKEN_REFRESH_MARGIN_MS = 60_000
export const MAX_RATE_LIMIT_RETRIES = 3
export const RATE_LIMIT_FALLBACK_DELAY_MS = 1000
// The API allows 2 requests per second per application
export const REQUEST_INTERVAL_MS = 500

// Analysis defaults
export const DEFAULT_CAMPUS_ID = 9
export const DEFAULT_DAYS = 60
export const MAX_DAYS = 365
export const DEFAULT_FETCH_TIMEOUT_MS = 5 * 60_000
export const TOP_HOSTS = 20

// Day-of-week index 0 is Monday
export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']
export const HOURS_PER_DAY = 24
export const DAYS_PER_WEEK = 7
export const SLOT_MINUTES = 10
export const SLOTS_PER_DAY = (HOURS_PER_DAY * 60) / SLOT_MINUTES
