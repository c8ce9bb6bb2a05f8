import { FileDescriptor } from '../types';

const UNIT_MULTIPLIERS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
  TB: 1024 * 1024 * 1024 * 1024
};

/**
 * Utility for byte sizes: totals, parsing and formatting
 */
export class SizeCalculator {
  /**
   * Calculate total size of files
   */
  static totalSize(files: readonly FileDescriptor[]): number {
    return files.reduce((total, file) => total + file.size, 0);
  }

  /**
   * Parse a size such as 512, "512", "10KB" or "1.5 GB" into bytes (1024-based)
   * Returns undefined for anything that is not a non-negative size
   */
  static parseSize(input: number | string): number | undefined {
    if (typeof input === 'number') {
      return Number.isFinite(input) && input >= 0 ? Math.floor(input) : undefined;
    }

    const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*([KMGT]?B)?$/i);
    if (!match) {
      return undefined;
    }

    const unit = (match[2] ?? 'B').toUpperCase();
    const multiplier = UNIT_MULTIPLIERS[unit];
    if (multiplier === undefined) {
      return undefined;
    }

    return Math.floor(parseFloat(match[1]) * multiplier);
  }

  /**
   * Format bytes to human readable string
   */
  static formatBytes(bytes: number): string {
    if (bytes < 0 || bytes === 0) return '0 B';

    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];

    // For bytes less than 1024, always use 'B'
    if (bytes < k) {
      return parseFloat(bytes.toFixed(2)) + ' B';
    }

    const i = Math.floor(Math.log(bytes) / Math.log(k));
    const sizeIndex = Math.min(i, sizes.length - 1);
    const size = sizes[sizeIndex];

    return parseFloat((bytes / Math.pow(k, sizeIndex)).toFixed(2)) + ' ' + size;
  }
}
