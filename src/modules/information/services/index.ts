export { InformationHierarchyService } from './information-hierarchy.service';
export { AnswerService } from './answer.service';
