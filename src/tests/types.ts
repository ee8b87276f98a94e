/**
 * Scenario input for table-driven tests.
 *
 * Use a builder function when the scenario mutates its input (mappings,
 * instances); every run then starts from fresh objects.
 */
export type ScenarioInput<T> = T | (() => T);

/**
 * A single row of a table-driven test.
 *
 * @template TInput - The type of the input payload.
 * @template TExpected - The type of the expected result.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  /** Short, unique identifier shown in the test title. */
  id: string;

  /** What the row checks, in one sentence. */
  description: string;

  input: ScenarioInput<TInput>;

  expected: TExpected;
};
