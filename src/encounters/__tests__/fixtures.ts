import type { Trial } from "../../trials/types";

let counter = 0;

export const makeTrial = (overrides: Partial<Trial> = {}): Trial => {
  counter += 1;
  return {
    userId: "U1",
    sessionId: "S1",
    level: 2,
    itemKey: "3x4",
    presentationTime: counter,
    givenResponse: 12,
    correct: 1,
    operandA: 3,
    operandB: 4,
    sourceIndex: counter,
    ...overrides
  };
};
