import { SessionView } from "../../domain/entities/Session";
import { SessionStatus } from "../../domain/value-objects/SessionStatus";

const STATUS_MARKERS: Record<SessionStatus, string> = {
  [SessionStatus.RUNNING]: "🟢",
  [SessionStatus.PAUSED]: "⏸️",
  [SessionStatus.STOPPING]: "⏹️",
  [SessionStatus.STOPPED]: "🔴",
  [SessionStatus.CRASHED]: "❌",
};

export const formatSessionStatus = (
  view: SessionView,
  maxRestarts: number
): string =>
  [
    `${STATUS_MARKERS[view.status]} Session: ${view.id.slice(0, 8)}…`,
    `Status : ${view.status}`,
    `Quality: ${view.tier}p  |  Source: ${view.sourceKind}`,
    `Loop   : ${view.loop ? "yes" : "no"}`,
    `Restarts: ${view.restartCount}/${maxRestarts}`,
  ].join("\n");

export const formatOwnerStatus = (
  views: SessionView[],
  maxRestarts: number
): string =>
  views.length === 0
    ? "No active broadcasts."
    : views.map((view) => formatSessionStatus(view, maxRestarts)).join("\n\n");
