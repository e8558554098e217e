/**
 * One-way channel to whoever controls a session. Implemented by the messaging
 * front end; delivery is best-effort.
 */
export interface Notifier {
  notify(ownerId: string, message: string): Promise<void> | void;
}
