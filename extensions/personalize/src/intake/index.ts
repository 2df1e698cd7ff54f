/**
 * Configuration Intake Module Index
 */

export {
  type ConfigIntakeConfig,
  type ConfigUploadResult,
  type S3UploadEvent,
  ConfigIntake,
  createConfigIntake,
  configurationErrorMessages,
  decodeObjectKey,
  handleConfigUpload,
} from "./config-upload.js";
