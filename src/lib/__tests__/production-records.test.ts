import { describe, it, expect } from "vitest";
import { InvalidRecordError } from "../errors";
import {
  compareMachineIds,
  createMachineRecord,
  createOperatorRecord,
  createProductionDataset,
  getFilterOptions,
} from "../production-records";
import { machineInput, operatorInput, sampleDataset } from "@/test/factories";

describe("createMachineRecord", () => {
  it("adds calendar fields and freezes the record", () => {
    const record = createMachineRecord(machineInput("2024-03-12", 2, { actualCounter: 95, production: 9 }));

    expect(record.dateKey).toBe("2024-03-12");
    expect(record.year).toBe(2024);
    expect(record.monthName).toBe("March");
    expect(record.isoWeek).toBe(11);
    expect(record.actualCounter).toBe(95);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("copies the input date", () => {
    const input = machineInput("2024-03-12", 2);
    const record = createMachineRecord(input);
    input.date.setFullYear(2030);

    expect(record.date.getFullYear()).toBe(2024);
  });

  it("rejects an invalid date", () => {
    const input = { ...machineInput("2024-03-12", 2), date: new Date(Number.NaN) };
    expect(() => createMachineRecord(input)).toThrow(InvalidRecordError);
  });
});

describe("createOperatorRecord", () => {
  it("rejects an invalid date with the collection name", () => {
    const input = { ...operatorInput("2024-03-12", "Asha", 1, 5), date: new Date("garbage") };
    expect(() => createOperatorRecord(input)).toThrow(
      "Invalid record in operator records: date is missing or not a valid calendar date",
    );
  });
});

describe("createProductionDataset", () => {
  it("freezes both collections", () => {
    const dataset = createProductionDataset({
      machines: [machineInput("2024-01-15", 1)],
      operators: [operatorInput("2024-01-15", "Asha", 1, 10)],
    });

    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.machines)).toBe(true);
    expect(Object.isFrozen(dataset.operators)).toBe(true);
    expect(dataset.operators[0].operatorName).toBe("Asha");
  });
});

describe("compareMachineIds", () => {
  it("orders numbers numerically before strings", () => {
    expect([10, "B", 2, "A"].sort(compareMachineIds)).toEqual([2, 10, "A", "B"]);
  });
});

describe("getFilterOptions", () => {
  it("lists years ascending and months in calendar order", () => {
    expect(getFilterOptions(sampleDataset())).toEqual({
      years: [2024, 2025],
      months: ["January", "February", "March"],
    });
  });
});
