import { instantRunoff, tallyInstantRunoff } from "../src/utils/votingSystems/irv";
import { EmptyInputError, InvalidArgumentError } from "../src/utils/errors";
import { repeat } from "./helpers";

const sevenBallots = [...repeat(["A", "F"], 3), ["B", "F"], ["C", "F"], ["D", "F"], ["E", "F"]];

describe("instant runoff", () => {
    it("declares an immediate majority winner", () => {
        const result = tallyInstantRunoff([["A"], ["A"], ["B"]]);
        expect(result.winner).toBe("A");
        expect(result.rounds).toHaveLength(1);
    });

    it("eliminates every candidate tied for last place in one round", () => {
        const result = tallyInstantRunoff([["A", "C"], ["B", "C"], ["C"], ["C"]]);
        expect(result.winner).toBe("C");
        expect(result.rounds?.[0].eliminated).toEqual(["A", "B"]);
        expect(result.counts).toEqual(new Map([["C", 4]]));
    });

    it("honours a higher win percentage", () => {
        const result = tallyInstantRunoff(sevenBallots, 75);
        expect(result.winner).toBe("F");
        expect(result.rounds?.map((r) => r.eliminated)).toEqual([["B", "C", "D", "E"], ["A"], []]);
    });

    it("returns null at a win percentage of 100, which no share can exceed", () => {
        const result = tallyInstantRunoff([["A"], ["A"], ["B"]], 100);
        expect(result.winner).toBeNull();
        expect(result.rounds?.map((r) => r.eliminated)).toEqual([["B"], ["A"], []]);
    });

    it("uses 50 percent whatever the environment says", () => {
        const saved = process.env.IRV_WIN_PERCENTAGE;
        process.env.IRV_WIN_PERCENTAGE = "75";
        try {
            expect(tallyInstantRunoff(sevenBallots).rounds).toHaveLength(2);
        } finally {
            if (saved === undefined) delete process.env.IRV_WIN_PERCENTAGE;
            else process.env.IRV_WIN_PERCENTAGE = saved;
        }
    });

    it("gives the same result when counted twice", () => {
        expect(tallyInstantRunoff(sevenBallots, 75)).toEqual(tallyInstantRunoff(sevenBallots, 75));
    });

    it("stops as soon as the leader clears the default percentage", () => {
        const result = tallyInstantRunoff(sevenBallots);
        expect(result.winner).toBe("F");
        expect(result.rounds).toHaveLength(2);
        expect(result.counts).toEqual(new Map([["A", 3], ["F", 4]]));
    });

    it("drops exhausted ballots from the count", () => {
        const result = tallyInstantRunoff([["A", "B"], ["A", "B"], ["C"], ["D"]]);
        expect(result.winner).toBe("A");
        expect(result.totalVotes).toBe(2);
        expect(result.rounds?.[1].exhausted).toBe(2);
    });

    it("returns null once every ballot is exhausted", () => {
        expect(instantRunoff([["A"], ["B"]])).toBeNull();
    });

    it("replays a one-shot iterable across rounds", () => {
        function* ballots() {
            yield ["A", "C"];
            yield ["B", "C"];
            yield ["C"];
            yield ["C"];
        }
        expect(instantRunoff(ballots())).toBe("C");
    });

    it("rejects win percentages outside [50, 100]", () => {
        expect(() => instantRunoff([["A"]], 49.9)).toThrow(InvalidArgumentError);
        expect(() => instantRunoff([["A"]], 100.1)).toThrow(InvalidArgumentError);
    });

    it("throws on zero ballots", () => {
        expect(() => instantRunoff([])).toThrow(EmptyInputError);
    });
});
