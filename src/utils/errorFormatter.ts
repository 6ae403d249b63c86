/**
 * Markdown block shown to tool callers in place of results.
 */
export function formatError(errorMessage: string): string {
  return `
## Error Occurred

${errorMessage}

### Troubleshooting Steps:

1. Check your internet connection
2. Verify that the SearXNG instance is online and accessible
3. Try using a different search engine or query
4. If using a custom instance, ensure the URL is correct
`;
}
