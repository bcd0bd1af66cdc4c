import { describe, it, expect } from "vitest";
import {
  buildOperatorSummary,
  formatMachinesHandled,
  joinOperatorEfficiency,
  leftJoinMachineCounters,
  machinesHandledByOperator,
} from "../operator-join";
import { createProductionDataset } from "../production-records";
import { machineInput, operatorInput } from "@/test/factories";

describe("operator efficiency through the (date, machine) join", () => {
  // X ran M1 on May 1 and M2 on May 2; only the M1 shift has a machine reading
  const { machines, operators } = createProductionDataset({
    machines: [machineInput("2024-05-01", "M1", { actualCounter: 90, ratedCounter: 100, production: 7 })],
    operators: [operatorInput("2024-05-01", "X", "M1", 10), operatorInput("2024-05-02", "X", "M2", 5)],
  });

  it("sums production from the operator records alone", () => {
    expect(buildOperatorSummary(operators, machines)).toEqual([
      { operatorName: "X", totalProduction: 15, machinesHandled: "M1, M2", machineIds: ["M1", "M2"], efficiencyPct: 90 },
    ]);
  });

  it("contributes zero counters for unmatched shifts", () => {
    expect(leftJoinMachineCounters(operators, machines)).toEqual([
      { operatorName: "X", actualCounter: 90, ratedCounter: 100 },
      { operatorName: "X", actualCounter: 0, ratedCounter: 0 },
    ]);
  });

  it("reports the joined totals behind the ratio", () => {
    const joined = joinOperatorEfficiency(operators, machines).get("X");
    expect(joined).toEqual({
      totalActual: 90,
      totalRated: 100,
      efficiencyPct: 90,
      machinesHandled: "M1, M2",
      machineIds: ["M1", "M2"],
    });
  });
});

describe("edge cases", () => {
  it("leaves efficiency undefined when no shift matched a machine reading", () => {
    const { machines, operators } = createProductionDataset({
      machines: [machineInput("2024-05-01", 1, { actualCounter: 50 })],
      operators: [operatorInput("2024-05-03", "Y", 1, 4)],
    });

    const [row] = buildOperatorSummary(operators, machines);
    expect(row.totalProduction).toBe(4);
    expect(row.efficiencyPct).toBeNull();
  });

  it("counts every machine reading a shift matches", () => {
    const { machines, operators } = createProductionDataset({
      machines: [
        machineInput("2024-05-01", 1, { actualCounter: 90, ratedCounter: 100 }),
        machineInput("2024-05-01", 1, { actualCounter: 30, ratedCounter: 50 }),
      ],
      operators: [operatorInput("2024-05-01", "Z", 1, 6)],
    });

    expect(leftJoinMachineCounters(operators, machines)).toHaveLength(2);
    expect(joinOperatorEfficiency(operators, machines).get("Z")?.efficiencyPct).toBe(80);
  });

  it("orders the summary by production, then by name", () => {
    const { machines, operators } = createProductionDataset({
      machines: [],
      operators: [
        operatorInput("2024-05-01", "Lena", 1, 3),
        operatorInput("2024-05-01", "Amir", 2, 8),
        operatorInput("2024-05-01", "Kofi", 3, 8),
      ],
    });

    expect(buildOperatorSummary(operators, machines).map((r) => r.operatorName)).toEqual(["Amir", "Kofi", "Lena"]);
  });
});

describe("machines handled", () => {
  it("lists distinct machines per operator in ascending order", () => {
    const { operators } = createProductionDataset({
      machines: [],
      operators: [
        operatorInput("2024-05-01", "Asha", 12, 1),
        operatorInput("2024-05-02", "Asha", 3, 1),
        operatorInput("2024-05-03", "Asha", 12, 1),
      ],
    });

    expect(machinesHandledByOperator(operators).get("Asha")).toEqual([3, 12]);
  });

  it("joins ids with the given delimiter", () => {
    expect(formatMachinesHandled([3, 12])).toBe("3, 12");
    expect(formatMachinesHandled([3, 12], " | ")).toBe("3 | 12");
    expect(formatMachinesHandled([])).toBe("");
  });
});
