/**
 * Report formatting for the command line.
 */

import type { BatchReport, ProgressSnapshot } from "../core/types"

export function formatProgress(snapshot: ProgressSnapshot): string {
  const { counts } = snapshot
  const done = counts.succeeded + counts.exhausted
  const percent = Math.floor(snapshot.completion * 100)
  return (
    `[${done}/${snapshot.total} ${percent}%] ` +
    `sent=${counts.succeeded} failed=${counts.exhausted} ` +
    `retrying=${snapshot.retrying} in-flight=${counts.in_flight} pending=${counts.pending}`
  )
}

export function formatReport(report: BatchReport): string {
  const { counts } = report.snapshot
  const seconds = (report.durationMs / 1000).toFixed(1)
  const lines = [
    `Batch ${report.status} in ${seconds}s`,
    `Successful: ${counts.succeeded}`,
    `Failed: ${counts.exhausted}`,
  ]
  if (counts.pending > 0) {
    lines.push(`Not sent: ${counts.pending}`)
  }

  const failures = report.results.filter((result) => result.status === "exhausted")
  if (failures.length > 0) {
    lines.push("", "Failures:")
    for (const failure of failures) {
      const label = failure.name ? `${failure.name} <${failure.phoneNumber}>` : failure.phoneNumber
      const reason = failure.lastError ? `${failure.lastError.kind}: ${failure.lastError.message}` : "unknown error"
      lines.push(`  ${label} after ${failure.attemptCount} attempt(s): ${reason}`)
    }
  }

  return lines.join("\n")
}
