import { CSV_COLUMNS } from '../const'
import type { EventRecord } from '../types'

const CSV_ROW_TERMINATOR = '\r\n'

/**
 * Quote a CSV field only when it needs it
 */
export const escapeCsvField = (value: string | undefined): string => {
  const cell = value ?? ''
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell
}

/**
 * Serialize events under the fixed header, dates written verbatim
 */
export const eventsToCsv = (events: readonly EventRecord[]): string => {
  const rows = events.map((event) =>
    CSV_COLUMNS.map((column) => escapeCsvField(event[column]))
  )
  return [[...CSV_COLUMNS], ...rows]
    .map((row) => row.join(',') + CSV_ROW_TERMINATOR)
    .join('')
}
