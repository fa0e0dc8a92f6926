export const NOTIFIER = Symbol("NOTIFIER");

/** Outbound operator messages. Implementations do not throw. */
export interface Notifier {
  notify(message: string): Promise<void>;
}
