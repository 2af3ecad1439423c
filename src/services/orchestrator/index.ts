export { SubmissionService, type SubmissionServiceOptions } from './submission-service.js';
