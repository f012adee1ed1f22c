export { createDriveSession, type CreateDriveSessionOptions } from './factory.js';
