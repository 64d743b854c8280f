export { createMockLogger, type MockLogger } from './logger-mock';

export { createMockWord, createMockSegment, createTimedSegment, createMockSpeechSegment } from './entity-factories';
