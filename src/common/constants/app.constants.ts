/**
 * Application-wide constants
 * Centralizes magic numbers and strings to improve maintainability
 */

export const APP_CONSTANTS = {
  APP: {
    NAME: 'Notification Router',
    VERSION: '1.0.0',
  },

  // Per tenant + lead, per calendar day
  RATE_LIMIT: {
    MAX_NOTIFICATIONS_PER_LEAD_PER_DAY: 3,
    DAY_KEY_FORMAT: 'yyyy-MM-dd',
  },

  CIRCUIT_BREAKER: {
    DEFAULT_FAILURE_THRESHOLD: 3,
    DEFAULT_OPEN_TIMEOUT_MS: 30000, // 30 seconds
    MAX_OPEN_TIMEOUT_MS: 3600000, // 1 hour
  },

  // Vendor identities reported in delivery outcomes
  VENDORS: {
    ROUTER: 'router',
    EMAIL: 'email-adapter',
    SMS: 'sms-adapter',
    CIRCUIT_BREAKER_SUFFIX: '-circuit-breaker',
  },

  PERFORMANCE: {
    MAX_ATTEMPT_TIMES_STORED: 1000,
  },
} as const;
