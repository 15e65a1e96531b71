/**
 * Utility functions for calculating and formatting metrics of index load operations
 */

export interface LoadMetrics {
  filesProcessed: number;
  totalFiles: number;
  bytesRead: number;
  progress: number;
  elapsedTime: number;
  filesPerSecond: number;
  throughputFormatted: string;
}

export class MetricsCalculator {
  /**
   * Calculate load metrics
   */
  static calculateLoadMetrics(
    filesProcessed: number,
    totalFiles: number,
    bytesRead: number,
    startTime: number,
    currentTime: number = Date.now()
  ): LoadMetrics {
    const elapsedTime = (currentTime - startTime) / 1000; // in seconds
    const progress =
      totalFiles > 0 ? Math.round((filesProcessed / totalFiles) * 100) : 100;
    const filesPerSecond = elapsedTime > 0 ? filesProcessed / elapsedTime : 0;
    const bytesPerSecond = elapsedTime > 0 ? bytesRead / elapsedTime : 0;

    return {
      filesProcessed,
      totalFiles,
      bytesRead,
      progress,
      elapsedTime,
      filesPerSecond,
      throughputFormatted: `${this.formatFileSize(bytesPerSecond)}/s`,
    };
  }

  /**
   * Format file size in human readable format
   */
  static formatFileSize(bytes: number): string {
    const units = ["B", "KB", "MB", "GB", "TB"];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(2)} ${units[unitIndex]}`;
  }

  /**
   * Format time duration in human readable format
   */
  static formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const remainingSeconds = seconds % 60;
      return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const remainingMinutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${remainingMinutes}m`;
    }
  }

  /**
   * Check if progress should be logged (at specific intervals)
   */
  static shouldLogProgress(
    progress: number,
    lastLoggedProgress: number,
    logInterval: number = 10
  ): boolean {
    return (
      Math.floor(progress / logInterval) >
      Math.floor(lastLoggedProgress / logInterval)
    );
  }
}
