export { SubjectChannel, subjectChannels } from './subject-channel.js';
