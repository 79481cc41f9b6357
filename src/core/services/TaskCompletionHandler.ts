export interface TaskCompletionHandler {
  // Marks an item processed in its source. Throws CompletionError.
  markComplete(itemId: string): Promise<void>;
  // Flags an item that failed processing so it can be looked at by hand.
  flagForReview(itemId: string, label: string): Promise<void>;
}
