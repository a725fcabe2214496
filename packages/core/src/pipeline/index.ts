export type {
  QuestionPlan,
  AnswerResult,
  AnswerOptions,
  QuestionAnswererOptions,
} from './question-answerer.js';
export { QuestionAnswerer, planQuestion, rankTaggedRows } from './question-answerer.js';
