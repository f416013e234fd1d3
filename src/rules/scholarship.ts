import type { ApplicantFacts, Rule, RuleSet } from '../types/index.js';

export const DEFAULT_APPLICANT: Readonly<ApplicantFacts> = Object.freeze({
  cgpa: 3.5,
  family_income: 5000,
  co_curricular_score: 75,
  disciplinary_actions: 0,
});

const rules: Rule[] = [
  {
    name: 'Top merit candidate',
    priority: 100,
    conditions: [
      ['cgpa', '>=', 3.7],
      ['co_curricular_score', '>=', 80],
      ['family_income', '<=', 8000],
      ['disciplinary_actions', '==', 0],
    ],
    action: {
      decision: 'AWARD FULL',
      reason: 'Excellent academic & co-curricular performance, with acceptable need',
    },
  },
  {
    name: 'Low CGPA not eligible',
    priority: 95,
    conditions: [['cgpa', '<', 2.5]],
    action: {
      decision: 'REJECT',
      reason: 'CGPA below minimum scholarship requirement',
    },
  },
  {
    name: 'Serious disciplinary record',
    priority: 90,
    conditions: [['disciplinary_actions', '>=', 2]],
    action: {
      decision: 'REJECT',
      reason: 'Too many disciplinary records',
    },
  },
  {
    name: 'Good candidate partial scholarship',
    priority: 80,
    conditions: [
      ['cgpa', '>=', 3.3],
      ['co_curricular_score', '>=', 60],
      ['family_income', '<=', 12000],
      ['disciplinary_actions', '<=', 1],
    ],
    action: {
      decision: 'AWARD PARTIAL',
      reason: 'Good academic & involvement record with moderate need',
    },
  },
  {
    name: 'Need-based review',
    priority: 70,
    conditions: [
      ['cgpa', '>=', 2.5],
      ['family_income', '<=', 4000],
    ],
    action: {
      decision: 'REVIEW',
      reason: 'High need but borderline academic score',
    },
  },
  {
    name: 'Default non-qualifier',
    priority: 1,
    conditions: [],
    action: {
      decision: 'NOT ELIGIBLE',
      reason: 'Applicant did not meet the criteria for any defined scholarship or review.',
    },
  },
];

export const SCHOLARSHIP_RULES: RuleSet = Object.freeze(rules);
