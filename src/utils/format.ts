/**
 * Converts bytes to a human-readable file size string
 * @param bytes Number of bytes, negative values keep their sign
 * @param decimals Number of decimal places to show (default: 2)
 * @returns Formatted string with appropriate unit (B, KB, MB, GB, TB)
 */
export function readableFileSize(bytes: number, decimals: number = 2): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return `-${readableFileSize(-bytes, decimals)}`;

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.max(Math.floor(Math.log(bytes) / Math.log(k)), 0), sizes.length - 1);

  return `${(bytes / Math.pow(k, i)).toFixed(decimals)} ${sizes[i]}`;
}

