import { seededRandom, shuffle } from '../../utils/random';
import { deepFreeze } from '../../utils/freeze';
import { inOrder } from '../helpers';

describe('random', () => {
    describe('shuffle', () => {
        it('should not modify the input', () => {
            const items = Object.freeze(['a', 'b', 'c', 'd']);

            const result = shuffle(items, seededRandom(1));

            expect(items).toEqual(['a', 'b', 'c', 'd']);
            expect([...result].sort()).toEqual(['a', 'b', 'c', 'd']);
        });

        it('should keep every position when the generator always picks the last index', () => {
            expect(shuffle([1, 2, 3, 4, 5], inOrder)).toEqual([1, 2, 3, 4, 5]);
        });

        it('should rotate when the generator always picks index 0', () => {
            // j = 0 at every step: [1,2,3,4] → [4,2,3,1] → [3,2,4,1] → [2,3,4,1]
            expect(shuffle([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
        });

        it('should handle empty and single-item lists', () => {
            expect(shuffle([], seededRandom(3))).toEqual([]);
            expect(shuffle(['only'], seededRandom(3))).toEqual(['only']);
        });

        it('should produce every permutation of three items about equally often', () => {
            const random = seededRandom(42);
            const counts = new Map<string, number>();
            const runs = 60000;

            for (let i = 0; i < runs; i++) {
                const key = shuffle(['x', 'y', 'z'], random).join('');
                counts.set(key, (counts.get(key) ?? 0) + 1);
            }

            expect(counts.size).toBe(6);
            for (const count of counts.values()) {
                expect(count).toBeGreaterThan(9000);
                expect(count).toBeLessThan(11000);
            }
        });

        it('should give each seat the werewolf about one time in five', () => {
            const random = seededRandom(99);
            const seats = [0, 0, 0, 0, 0];
            const runs = 20000;

            for (let i = 0; i < runs; i++) {
                const dealt = shuffle(['W', 'V', 'V', 'V', 'V'], random);
                seats[dealt.indexOf('W')]++;
            }

            for (const hits of seats) {
                expect(hits / runs).toBeGreaterThan(0.18);
                expect(hits / runs).toBeLessThan(0.22);
            }
        });
    });

    describe('seededRandom', () => {
        it('should repeat the same sequence for the same seed', () => {
            const a = seededRandom(7);
            const b = seededRandom(7);
            const c = seededRandom(8);

            const seqA = [a(), a(), a()];
            expect([b(), b(), b()]).toEqual(seqA);
            expect([c(), c(), c()]).not.toEqual(seqA);
        });

        it('should stay within [0, 1)', () => {
            const random = seededRandom(123);
            for (let i = 0; i < 1000; i++) {
                const value = random();
                expect(value).toBeGreaterThanOrEqual(0);
                expect(value).toBeLessThan(1);
            }
        });
    });
});

describe('deepFreeze', () => {
    it('should freeze nested objects and arrays', () => {
        const value = deepFreeze({ a: { b: [1, { c: 2 }] } });

        expect(Object.isFrozen(value)).toBe(true);
        expect(Object.isFrozen(value.a)).toBe(true);
        expect(Object.isFrozen(value.a.b)).toBe(true);
        expect(Object.isFrozen(value.a.b[1])).toBe(true);
    });
});
