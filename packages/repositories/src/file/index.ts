export { FileMirrorRepository, createFileMirrorRepository } from './mirror-repository.js';
