"use strict";

import { ManagerStatus } from "../api/types";

export function formatReport(status: ManagerStatus): string {
  const lines = ["=== Subscriber statistics ==="];
  for (const session of status.sessions) {
    lines.push(`  ${session.id}: ${session.state}, messages: ${session.count}`);
  }
  lines.push(
    `Total received: ${status.totalCount} (unique ${status.uniqueMessageCount}, ` +
      `redelivered ${status.redeliveryCount}, anomalies ${status.anomalyCount})`,
  );
  lines.push(`Disconnected sessions: ${status.disconnectedSessionIds.length}`);
  return lines.join("\n");
}
