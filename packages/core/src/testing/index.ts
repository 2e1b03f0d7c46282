export {
  InMemorySessionRepository,
  InMemoryUserStore,
  InMemoryVerificationRepository,
  RecordingMailSender,
} from './in-memory-stores.js';
