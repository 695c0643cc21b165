import { describe, it } from 'node:test';
import assert from 'node:assert';
import { HashIndexSource, SequenceIndexSource } from '../../libs/oracle/indexSource.js';

describe('IndexSource', () => {
    describe('HashIndexSource', () => {
        it('should stay within range', () => {
            const source = new HashIndexSource(Buffer.from('test-seed'));
            for (let i = 0; i < 200; i++) {
                const index = source.next('oracle-1');
                assert.ok(Number.isInteger(index) && index >= 0 && index < 10, `index ${index} out of range`);
            }
        });

        it('should reproduce the same draws for the same seed and caller', () => {
            const a = new HashIndexSource(Buffer.from('test-seed'));
            const b = new HashIndexSource(Buffer.from('test-seed'));
            const drawsA = [a.next('oracle-1'), a.next('oracle-1'), a.next('oracle-2')];
            const drawsB = [b.next('oracle-1'), b.next('oracle-1'), b.next('oracle-2')];
            assert.deepStrictEqual(drawsA, drawsB);
        });

        it('should honor a custom range', () => {
            const source = new HashIndexSource(Buffer.from('test-seed'), 3);
            for (let i = 0; i < 50; i++) {
                assert.ok([0, 1, 2].includes(source.next('oracle-1')));
            }
        });

        it('should refuse a range too small for three distinct indexes', () => {
            assert.throws(() => new HashIndexSource(Buffer.from('test-seed'), 2), RangeError);
            assert.throws(() => new HashIndexSource(Buffer.from('test-seed'), 0), RangeError);
            assert.throws(() => new HashIndexSource(Buffer.from('test-seed'), 4.5), RangeError);
        });
    });

    describe('SequenceIndexSource', () => {
        it('should replay and cycle its sequence', () => {
            const source = new SequenceIndexSource([4, 7]);
            assert.deepStrictEqual([source.next(), source.next(), source.next()], [4, 7, 4]);
            assert.strictEqual(source.consumed(), 3);
        });

        it('should refuse an empty sequence', () => {
            assert.throws(() => new SequenceIndexSource([]), RangeError);
        });
    });
});
