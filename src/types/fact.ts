export type Scalar = number | string | boolean;

export type FactMap = Readonly<Record<string, Scalar>>;

export type TaggedScalar =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean };

/** Inputs of the reference scholarship domain. */
export type ApplicantFacts = {
  cgpa: number;
  family_income: number;
  co_curricular_score: number;
  disciplinary_actions: number;
};
