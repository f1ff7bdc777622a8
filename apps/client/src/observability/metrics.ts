/**
 * Session metrics tracking
 */

export class Metrics {
  private connects: number = 0;
  private disconnects: number = 0;
  private totalBytesSent: number = 0;
  private totalBytesReceived: number = 0;
  private messagesProcessed: number = 0;
  private pushMessages: number = 0;
  private commandsSent: number = 0;
  private fatalErrors: number = 0;
  private startTime: number = Date.now();

  /**
   * Count a transport that reached the relay
   */
  connected(): void {
    this.connects++;
  }

  /**
   * Count a finished connection and its traffic
   */
  disconnected(bytesSent: number, bytesReceived: number): void {
    this.disconnects++;
    this.totalBytesSent += bytesSent;
    this.totalBytesReceived += bytesReceived;
  }

  /**
   * Increment message count
   */
  messageProcessed(push: boolean): void {
    this.messagesProcessed++;
    if (push) this.pushMessages++;
  }

  commandSent(): void {
    this.commandsSent++;
  }

  fatalError(): void {
    this.fatalErrors++;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot() {
    const uptimeMs = Date.now() - this.startTime;
    const uptimeSec = Math.floor(uptimeMs / 1000);

    return {
      uptime: `${uptimeSec}s`,
      connects: this.connects,
      disconnects: this.disconnects,
      totalBytesSent: this.formatBytes(this.totalBytesSent),
      totalBytesReceived: this.formatBytes(this.totalBytesReceived),
      messagesProcessed: this.messagesProcessed,
      pushMessages: this.pushMessages,
      commandsSent: this.commandsSent,
      fatalErrors: this.fatalErrors,
    };
  }

  /**
   * Format bytes to human-readable
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }
}
