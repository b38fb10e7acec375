/**
 * Error Messages with Actionable Suggestions
 *
 * Builds the user-facing text for the failures a caller can do something
 * about: no browser listening, a dead connection, a bad navigation.
 */

export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run */
  command?: string;
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// SESSION ERRORS
// =============================================================================

/**
 * No debuggable target could be found or created
 */
export function noTargetAvailableMessage(host: string, port: number): string {
  return buildErrorMessage({
    message: `No debuggable browser targets found at ${host}:${port}.`,
    command: `chromium --remote-debugging-port=${port} --remote-allow-origins=*`,
    suggestions: [
      'Check that the browser is running with remote debugging enabled',
      'Set CHROME_CDP_PORT if the browser listens on another port',
    ],
  });
}

/**
 * A command could not be delivered even after reconnecting
 */
export function commandFailureMessage(method: string, reason: string): string {
  return buildErrorMessage({
    message: `CDP command failed for ${method}: ${reason}`,
    suggestions: [
      'The browser tab may have been closed or crashed',
      'Restart the browser and run the operation again',
    ],
  });
}

export function navigationFailureMessage(url: string, reason: string): string {
  return `Navigation to ${url} failed: ${reason}`;
}
