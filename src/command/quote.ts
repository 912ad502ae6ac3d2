// Characters that never need quoting in a shell word on either platform.
const SAFE_ARGUMENT = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument for display in a command line.
 * POSIX uses single quotes ('it'\''s'); Windows uses double quotes ("say \"hi\"").
 */
export function quoteArgument(value: string, platform: NodeJS.Platform = process.platform): string {
  if (SAFE_ARGUMENT.test(value)) return value;
  if (platform === 'win32') {
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
