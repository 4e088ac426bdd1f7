/**
 * Error messages with actionable suggestions
 *
 * Provides user-friendly error messages that include a clear description
 * of what went wrong and what to change.
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// CONFIGURATION ERRORS
// =============================================================================

/**
 * Both remote attach modes were configured at once
 */
export function conflictingAttachModesError(): string {
  return buildErrorMessage({
    message: 'Both a CDP URL and a connect URL are set; only one remote browser can be attached.',
    suggestions: [
      'Set cdpUrl to attach over the Chrome DevTools Protocol',
      'Set connectUrl to attach to a Playwright browser server',
    ],
  });
}

/**
 * A named context was requested while the pool is closing or closed
 */
export function poolClosedError(contextName: string): string {
  return buildErrorMessage({
    message: `Cannot create context "${contextName}": the context pool is closed.`,
    suggestions: ['Create a new fetcher instead of reusing one after close()'],
  });
}

// =============================================================================
// BROWSER ERRORS
// =============================================================================

/**
 * Attaching to a remote browser failed
 */
export function remoteBrowserConnectionError(
  mode: 'cdp' | 'connect',
  details?: string
): string {
  return buildErrorMessage({
    message: `Failed to attach to the remote browser over ${mode === 'cdp' ? 'CDP' : 'the Playwright protocol'}.`,
    suggestions: [
      details || 'Check the endpoint URL',
      'Check that the browser is running and reachable',
    ],
  });
}
