import { findCurrentIndex, getPrefetchTargets } from "../prefetchPlanner";
import { makeTrack } from "./helpers/fixtures";

const queue = ["A", "B", "C", "D", "E"].map((name, index) =>
    makeTrack({ title: name, file: `${name}.flac`, queueId: 100 + index })
);

describe("prefetchPlanner", () => {
    it("returns the neighbours around the current index, excluding the current track", () => {
        expect(getPrefetchTargets(queue, 2)).toEqual(["D.flac", "B.flac"]);
    });

    it("honours a wider window, nearest entries first", () => {
        expect(getPrefetchTargets(queue, 2, { ahead: 2, behind: 2 })).toEqual([
            "D.flac",
            "E.flac",
            "B.flac",
            "A.flac",
        ]);
    });

    it("clips the window at the ends of the queue", () => {
        expect(getPrefetchTargets(queue, 0)).toEqual(["B.flac"]);
        expect(getPrefetchTargets(queue, 4)).toEqual(["D.flac"]);
    });

    it("returns nothing without a current index", () => {
        expect(getPrefetchTargets(queue, null)).toEqual([]);
        expect(getPrefetchTargets(queue, 9)).toEqual([]);
        expect(getPrefetchTargets([], 0)).toEqual([]);
    });

    it("skips duplicates and repeats of the current file", () => {
        const repeated = [
            makeTrack({ file: "x.flac" }),
            makeTrack({ file: "y.flac" }),
            makeTrack({ file: "x.flac" }),
            makeTrack({ file: "y.flac" }),
        ];

        expect(getPrefetchTargets(repeated, 2, { ahead: 1, behind: 2 })).toEqual([
            "y.flac",
        ]);
    });

    it("finds the current index by queue id before falling back to the file", () => {
        const duplicateFiles = [
            makeTrack({ file: "same.flac", queueId: 1 }),
            makeTrack({ file: "same.flac", queueId: 2 }),
        ];

        expect(findCurrentIndex(duplicateFiles, makeTrack({ file: "same.flac", queueId: 2 }))).toBe(1);
        expect(findCurrentIndex(queue, makeTrack({ file: "C.flac" }))).toBe(2);
        expect(findCurrentIndex(queue, makeTrack({ file: "missing.flac" }))).toBeNull();
        expect(findCurrentIndex(queue, null)).toBeNull();
    });
});
