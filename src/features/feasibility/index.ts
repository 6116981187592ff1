export type { StudyContext, StudyRequest, StudySettings, FeasibilityStudy } from './pipeline';
export { runFeasibilityStudy } from './pipeline';
export { createStudyContext } from './context';
