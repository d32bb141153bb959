/**
 * Type declarations for the logic-solver npm package (MiniSat via Emscripten),
 * limited to the API this project calls.
 */

declare module "logic-solver" {
  namespace Logic {
    const FALSE: string;

    type Formula = object;
    type Term = string | number | Formula;

    function or(...operands: Term[]): Formula;

    class Solver {
      constructor();
      getVarNum(variableName: string): number;
      require(...args: Term[]): void;
      solve(): Solution | null;
    }

    class Solution {
      getTrueVars(): string[];
    }
  }

  export = Logic;
}
