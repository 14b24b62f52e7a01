import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { rankCandidates, recencyBoost } from "../../src/search";
import { safeWatermark } from "../../src/sync";
import type { UnitRecord } from "../../src/types";
import { bruteForceKnn, squaredDistance } from "../../src/vector-store";
import { DAY, T0, record, unit } from "../helpers";

const component = fc.float({ min: Math.fround(-1), max: Math.fround(1), noNaN: true });
const vector = fc.array(component, { minLength: 3, maxLength: 3 }).map((xs) => Float32Array.from(xs));

describe("knn properties", () => {
  it("matches a full sort truncated to k", () => {
    fc.assert(
      fc.property(fc.array(vector, { maxLength: 40 }), vector, fc.integer({ min: 0, max: 50 }), (vecs, query, k) => {
        const entries: [string, Float32Array][] = vecs.map((v, i) => [`u${String(i).padStart(3, "0")}`, v]);
        const expected = entries
          .map(([uid, v]) => ({ uid, distance: squaredDistance(query, v) }))
          .sort((a, b) => a.distance - b.distance || (a.uid < b.uid ? -1 : 1))
          .slice(0, k);
        expect(bruteForceKnn(entries, query, k)).toEqual(expected);
      }),
    );
  });
});

describe("ranking properties", () => {
  const now = T0 + 365 * DAY;
  const candidate = fc.record({
    distance: fc.double({ min: 0, max: 4, noNaN: true }),
    ageDays: fc.integer({ min: -5, max: 90 }),
  });

  it("returns at most limit results, above threshold, ordered by score with dense ranks", () => {
    fc.assert(
      fc.property(
        fc.array(candidate, { maxLength: 30 }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.integer({ min: 1, max: 20 }),
        (cands, minSimilarity, limit) => {
          const neighbors = cands.map((c, i) => ({ uid: `u${i}`, distance: c.distance }));
          const units = new Map<string, UnitRecord>(
            cands.map((c, i) => [`u${i}`, record(unit(`u${i}`, "x", now - c.ageDays * DAY))]),
          );
          const out = rankCandidates(
            neighbors,
            units,
            { minSimilarity, recencyWindowDays: 30, recencyMaxBoost: 0.1 },
            limit,
            now,
          );

          expect(out.length).toBeLessThanOrEqual(limit);
          out.forEach((r, i) => {
            expect(r.rank).toBe(i + 1);
            expect(r.similarity).toBeGreaterThanOrEqual(minSimilarity);
            expect(r.score).toBeGreaterThanOrEqual(r.similarity);
            expect(r.score).toBeLessThanOrEqual(r.similarity + 0.1);
            if (i > 0) expect(out[i - 1].score).toBeGreaterThanOrEqual(r.score);
          });
        },
      ),
    );
  });

  it("recency boost stays within [0, maxBoost] and never grows with age", () => {
    fc.assert(
      fc.property(
        fc.double({ min: -10, max: 100, noNaN: true }),
        fc.double({ min: 0, max: 50, noNaN: true }),
        fc.double({ min: 0.01, max: 60, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (age, extra, window, maxBoost) => {
          const b = recencyBoost(age, window, maxBoost);
          expect(b).toBeGreaterThanOrEqual(0);
          expect(b).toBeLessThanOrEqual(maxBoost);
          expect(recencyBoost(age + extra, window, maxBoost)).toBeLessThanOrEqual(b);
        },
      ),
    );
  });
});

describe("watermark properties", () => {
  it("is monotone in committed work, bounded by now, and covers only committed units", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 0, max: 1000 }), { maxLength: 30 }),
        fc.integer({ min: 0, max: 1200 }),
        (times, now) => {
          const sorted = [...times].sort((a, b) => a - b).map((t, i) => unit(`u${i}`, "x", t));
          let previous: number | null = null;
          for (let committed = 0; committed <= sorted.length; committed++) {
            const w = safeWatermark(sorted, committed, now);
            if (w !== null) {
              expect(w).toBeLessThanOrEqual(now);
              sorted.slice(committed).forEach((u) => expect(u.lastModified).toBeGreaterThan(w));
              if (previous !== null) expect(w).toBeGreaterThanOrEqual(previous);
            } else {
              expect(previous).toBeNull();
            }
            previous = w;
          }
        },
      ),
    );
  });
});
