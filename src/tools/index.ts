// Conversation log
export { appendMessageTool, appendMessageSchema, type AppendMessageInput } from './context.js';

// Pinned files
export {
  addFileTool,
  addFileSchema,
  removeFileTool,
  removeFileSchema,
  listFilesTool,
  listFilesSchema,
  type AddFileInput,
  type RemoveFileInput,
} from './context.js';

// Payload and health
export {
  buildPayloadTool,
  buildPayloadSchema,
  usageTool,
  usageSchema,
  statsTool,
  statsSchema,
  type BuildPayloadToolInput,
} from './context.js';

// Disk access
export { readPinnableFile, pinDirectory, type DirectoryPinResult, type SkippedFile } from '../disk.js';
