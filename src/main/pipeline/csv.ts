import { getProtocol, type PhysicalSample } from '../protocols';

export function formatFixed(value: number, digits = 3): string {
    return value.toFixed(digits);
}

function trimFraction(text: string): string {
    if (!text.includes('.')) {
        return text;
    }
    return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * printf-style `%g`: `precision` significant digits, exponent notation for
 * very small or large magnitudes, trailing zeros removed.
 */
export function formatG(value: number, precision = 6): string {
    if (Number.isNaN(value)) return 'nan';
    if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
    if (value === 0) return '0';

    const [mantissa, exponentText] = value.toExponential(precision - 1).split('e');
    const exponent = Number(exponentText);
    if (exponent < -4 || exponent >= precision) {
        const sign = exponent < 0 ? '-' : '+';
        return `${trimFraction(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
    }
    return trimFraction(value.toFixed(Math.max(0, precision - 1 - exponent)));
}

export function csvHeader(mode: string, packetSize: number): string {
    return getProtocol(mode).csvHeader(packetSize);
}

export function sampleRows(samples: PhysicalSample[]): string[] {
    return samples.map(s => s.gateVoltage === undefined
        ? `${formatFixed(s.x)},${formatG(s.current)}`
        : `${formatFixed(s.x)},${formatG(s.current)},${formatFixed(s.gateVoltage)}`
    );
}

export interface OutputCurveSamples {
    gateVoltage: number;
    samples: PhysicalSample[];
}

/**
 * Joins output curves into one table keyed by drain voltage. A drain
 * voltage visited twice in a curve (forward and backward sweep) gets one
 * row per visit; cells a curve has no sample for stay empty.
 */
export function outputTable(curves: OutputCurveSamples[]): string[] {
    const header = ['Vd', ...curves.map(c => `Id(Vg=${c.gateVoltage}mV)`)].join(',');
    const rows = new Map<string, { vd: number; cells: string[] }>();

    curves.forEach((curve, column) => {
        const seen = new Map<string, number>();
        for (const sample of curve.samples) {
            const vd = formatFixed(sample.x);
            const visit = (seen.get(vd) ?? 0) + 1;
            seen.set(vd, visit);
            const key = `${vd}#${visit}`;
            let row = rows.get(key);
            if (!row) {
                row = { vd: sample.x, cells: curves.map(() => '') };
                rows.set(key, row);
            }
            row.cells[column] = formatG(sample.current);
        }
    });

    return [header, ...[...rows.values()].map(row => [formatFixed(row.vd), ...row.cells].join(','))];
}
