/**
 * Error formatting utilities for user-friendly error messages
 */

import { SubsonicApiError, SubsonicTransportError } from '../subsonic/errors.js';
import { TelegramError } from '../notifications/telegram.js';

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

/**
 * Subsonic error codes and what to do about them
 */
const SUBSONIC_CODE_HINTS: Record<number, { message: string; suggestion: string }> = {
  10: { message: 'Request rejected by Navidrome', suggestion: 'A required parameter is missing. Check the server version.' },
  20: { message: 'Client too old for Navidrome', suggestion: 'The server expects a newer Subsonic API version.' },
  30: { message: 'Navidrome is too old', suggestion: 'Upgrade Navidrome to a version supporting Subsonic API 1.16.1.' },
  40: { message: 'Wrong Navidrome username or password', suggestion: 'Check NAVIDROME_USER and NAVIDROME_PASSWORD.' },
  41: { message: 'Token authentication not supported', suggestion: 'Navidrome must allow salted token authentication.' },
  50: { message: 'Navidrome user is not authorized', suggestion: 'Give the NAVIDROME_USER account access to the library.' },
  70: { message: 'Requested item not found on Navidrome', suggestion: 'The album may have been removed. The next sync will drop it.' }
};

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

/**
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  const errorStr = maskAuthParams(error instanceof Error ? error.message : String(error));

  if (error instanceof SubsonicApiError) {
    const hint = SUBSONIC_CODE_HINTS[error.code];
    if (hint) {
      return {
        message: `${hint.message} while ${context}`,
        suggestion: hint.suggestion,
        technical: `Subsonic error ${error.code}: ${shortenMessage(error.detail)}`
      };
    }
  }

  // Timeout errors
  if (errorStr.includes('Timeout awaiting') || errorStr.includes('timeout') || errorStr.includes('ETIMEDOUT')) {
    return {
      message: `Navidrome timed out while ${context}`,
      suggestion: 'Check if Navidrome is busy scanning the library. Raise NAVIDROME_TIMEOUT or try again later.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Connection errors
  if (errorStr.includes('ECONNREFUSED')) {
    return {
      message: `Cannot connect to Navidrome while ${context}`,
      suggestion: 'Check if Navidrome is running and NAVIDROME_URL is correct.',
      technical: extractUrl(errorStr)
    };
  }

  // Network errors
  if (errorStr.includes('ENOTFOUND') || errorStr.includes('getaddrinfo')) {
    return {
      message: `DNS lookup failed while ${context}`,
      suggestion: 'Check the NAVIDROME_URL hostname. Verify DNS resolution.',
      technical: extractUrl(errorStr)
    };
  }

  // Authentication errors
  const statusCode =
    error instanceof SubsonicTransportError || error instanceof TelegramError ? error.statusCode : undefined;
  if (statusCode === 401 || errorStr.includes('401') || errorStr.includes('Unauthorized')) {
    return {
      message: `Authentication failed while ${context}`,
      suggestion:
        error instanceof TelegramError
          ? 'Check TELEGRAM_BOT_TOKEN is valid.'
          : 'Check NAVIDROME_USER and NAVIDROME_PASSWORD.',
      technical: 'HTTP 401 Unauthorized'
    };
  }

  // Rate limiting
  if (statusCode === 429 || errorStr.includes('429') || errorStr.includes('Too Many Requests')) {
    return {
      message: `Rate limited while ${context}`,
      suggestion: 'Telegram rate limit reached. Wait a minute before retrying.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Database errors
  if (errorStr.includes('SQLITE') || errorStr.includes('database')) {
    return {
      message: `Database error while ${context}`,
      suggestion: 'Check DATABASE_PATH file permissions and disk space.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details.',
    technical: extractTechnicalDetails(errorStr)
  };
}

/**
 * Extract the server URL from an error message, without query params (they carry the auth token)
 */
function extractUrl(errorStr: string): string | undefined {
  const urlMatch = errorStr.match(/https?:\/\/[^\s"?]+/);
  return urlMatch ? urlMatch[0] : undefined;
}

/**
 * Extract technical details without full stack trace
 */
function extractTechnicalDetails(errorStr: string): string | undefined {
  const cleaned = errorStr.split('\n')[0] ?? errorStr;
  return shortenMessage(cleaned);
}

/**
 * Hide the Subsonic token, salt and password query parameters
 */
function maskAuthParams(errorStr: string): string {
  return errorStr.replace(/([?&](?:t|s|p)=)[^&\s]+/g, '$1***');
}

/**
 * Shorten long error messages
 */
function shortenMessage(msg: string): string {
  const maxLength = 150;
  if (msg.length <= maxLength) {
    return msg;
  }
  return msg.substring(0, maxLength) + '...';
}
