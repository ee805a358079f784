import type { Logger } from "./logger";
import { errorMessage } from "./utils";

export interface OrchestratorNotifier {
  /** Drift between local and remote state, surfaced to whoever operates the bot. */
  warnOperator(message: string): Promise<void>;
  reportError(message: string, error: unknown): Promise<void>;
  /** Broadcast to the people using the workload. */
  announce(message: string): Promise<void>;
  activeWorkloadChanged(workload: string | undefined): Promise<void>;
}

export const silentNotifier: OrchestratorNotifier = {
  warnOperator: async () => undefined,
  reportError: async () => undefined,
  announce: async () => undefined,
  activeWorkloadChanged: async () => undefined
};

/**
 * Wraps a notifier so a failed delivery is logged rather than failing the
 * operation that triggered it.
 */
export function guardNotifier(notifier: OrchestratorNotifier, logger: Logger): OrchestratorNotifier {
  const guard = async (kind: string, deliver: () => Promise<void>) => {
    try {
      await deliver();
    } catch (error) {
      logger.error(`Failed to deliver ${kind} notification: ${errorMessage(error)}`, { error });
    }
  };

  return {
    warnOperator: (message) => guard("operator warning", () => notifier.warnOperator(message)),
    reportError: (message, error) => guard("error report", () => notifier.reportError(message, error)),
    announce: (message) => guard("announcement", () => notifier.announce(message)),
    activeWorkloadChanged: (workload) => guard("workload change", () => notifier.activeWorkloadChanged(workload))
  };
}
