/**
 * Multi-subject comparison exports
 * @module comparison
 */

export {
  extractSubjectId,
  readAverageLoop,
  toPercentTLC,
  compareSubjects,
  type AverageLoop,
  type SubjectLoop,
  type ComparisonTableSet,
} from './tlc';

export { compareSubjectFiles, type ComparisonReport } from './files';
