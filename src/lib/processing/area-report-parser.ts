/**
 * Area Report Parser
 *
 * Reads the "Floor Areas" schedule exported from the design model and pulls
 * out the living and total covered subtotals.
 *
 * Single-story schedules print the subtotal on the label row itself:
 *   Living           | 1400 SF
 * Multi-story schedules leave the label row blank and print the subtotal on
 * the first blank-label row after the per-floor rows:
 *   Living           |
 *   First Floor      | 900 SF
 *   Second Floor     | 500 SF
 *                    | 1400 SF
 */

import type { ReportRow, TabularReport } from '../../types';

export const LIVING_LABEL = 'Living';
export const TOTAL_COVERED_LABEL = 'Total Covered';
export const FLOOR_AREA_REPORT_PREFIX = 'Floor Areas';

function labelCell(row: ReportRow): string {
    return (row[0] ?? '').trim();
}

function valueCell(row: ReportRow): string {
    return row.length > 0 ? row[row.length - 1].trim() : '';
}

function labelEquals(row: ReportRow, label: string): boolean {
    return labelCell(row).toLowerCase() === label.toLowerCase();
}

/**
 * Parse "2206 SF" → 2206. Anything that isn't a non-negative integer after
 * removing "SF" yields 0.
 */
export function parseAreaValue(text: string): number {
    const cleaned = text.replaceAll('SF', '').trim();
    if (!/^\+?\d+$/.test(cleaned)) return 0;

    return parseInt(cleaned, 10);
}

/**
 * Value of the first row labelled `label`, or 0 when there is no such row.
 */
export function extractSubtotal(rows: ReportRow[], label: string): number {
    const row = rows.find(r => labelEquals(r, label));
    return row ? parseAreaValue(valueCell(row)) : 0;
}

export function extractTotalArea(rows: ReportRow[]): number {
    return extractSubtotal(rows, TOTAL_COVERED_LABEL);
}

export function extractLivingArea(rows: ReportRow[]): number {
    const start = rows.findIndex(r => labelEquals(r, LIVING_LABEL));
    if (start === -1) return 0;

    const ownValue = valueCell(rows[start]);
    if (ownValue !== '') return parseAreaValue(ownValue);

    for (let i = start + 1; i < rows.length; i++) {
        const label = labelCell(rows[i]);
        const value = valueCell(rows[i]);

        if (label === '' && value !== '') return parseAreaValue(value);

        // Any other labelled row that isn't a floor line starts a new section
        if (label !== '' && !label.includes('Floor')) return 0;
    }

    return 0;
}

/**
 * The first report titled "Floor Areas..." whose last column holds at least
 * one positive area. Reports with only zero or unparseable cells are skipped.
 */
export function findFloorAreaReport(reports: TabularReport[]): TabularReport | null {
    for (const report of reports) {
        if (!report.title.toLowerCase().startsWith(FLOOR_AREA_REPORT_PREFIX.toLowerCase())) continue;

        const hasArea = report.rows.some(row => parseAreaValue(valueCell(row)) > 0);
        if (hasArea) return report;
    }

    return null;
}
