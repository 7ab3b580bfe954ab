/**
 * One sample of the local clipboard taken by the change poller.
 */
export interface ClipboardSnapshot {
  /** Clipboard text as read, untrimmed */
  text: string;
  /** When the sample was taken (epoch ms) */
  observedAt: number;
}
