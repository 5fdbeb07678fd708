/**
 * Append-only destination of one journal.
 */
export interface JournalSink {
  /**
   * Write `content`, replacing what the sink holds unless `append` is set.
   */
  write(content: string, append: boolean): Promise<void>
}

export type JournalSinkFactory = (targetPath: string) => JournalSink
