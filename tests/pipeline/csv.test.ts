import { describe, expect, it } from 'vitest';
import { csvHeader, formatG, outputTable, sampleRows } from '../../src/main/pipeline/csv';

describe('formatG', () => {
    it.each([
        [-1.2868e-6, '-1.2868e-06'],
        [0.01024, '0.01024'],
        [0.0001, '0.0001'],
        [0.00001234, '1.234e-05'],
        [100, '100'],
        [-0.5, '-0.5'],
        [123456789, '1.23457e+08'],
        [0, '0']
    ])('formats %d as %s', (value, expected) => {
        expect(formatG(value)).toBe(expected);
    });

    it('spells out non-finite values', () => {
        expect(formatG(Number.NaN)).toBe('nan');
        expect(formatG(Number.POSITIVE_INFINITY)).toBe('inf');
        expect(formatG(Number.NEGATIVE_INFINITY)).toBe('-inf');
    });
});

describe('csv layout', () => {
    it('picks the header from the step type', () => {
        expect(csvHeader('transfer', 5)).toBe('Vg,Id');
        expect(csvHeader('transient', 7)).toBe('Time,Id');
        expect(csvHeader('transient', 9)).toBe('Time,Id,Vg');
        expect(csvHeader('output', 5)).toBe('Vd,Id');
    });

    it('writes one row per sample', () => {
        expect(sampleRows([
            { x: 0.5, current: -0.01024 },
            { x: 1.25, current: 2e-7, gateVoltage: -0.3 }
        ])).toEqual(['0.500,-0.01024', '1.250,2e-07,-0.300']);
    });

    it('joins output curves on drain voltage', () => {
        expect(outputTable([
            { gateVoltage: -100, samples: [{ x: 0, current: 0.001 }, { x: 0.1, current: 0.002 }] },
            { gateVoltage: 200, samples: [{ x: 0, current: -0.001 }] }
        ])).toEqual([
            'Vd,Id(Vg=-100mV),Id(Vg=200mV)',
            '0.000,0.001,-0.001',
            '0.100,0.002,'
        ]);
    });

    it('keeps forward and backward visits of a drain voltage apart', () => {
        expect(outputTable([
            { gateVoltage: 0, samples: [{ x: 0, current: 1 }, { x: 0.1, current: 2 }, { x: 0, current: 3 }] }
        ])).toEqual(['Vd,Id(Vg=0mV)', '0.000,1', '0.100,2', '0.000,3']);
    });
});
