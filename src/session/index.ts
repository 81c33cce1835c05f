/**
 * @entry Session
 *
 * Sessions, their test inputs, and export.
 */

export {
  createSession,
  getSession,
  listSessions,
  updateSession,
  deleteSession,
  DEFAULT_BATCH_SIZE,
  DEFAULT_TEMPERATURE,
  DEFAULT_LIST_LIMIT,
} from './manageSessions.js'

export {
  createInputs,
  getInput,
  listInputs,
  countInputs,
  deleteInput,
  getBatch,
  detectInputFormat,
  parseInputsFile,
  validatePromptTemplate,
} from './manageInputs.js'
export type { InputFileFormat } from './manageInputs.js'

export { exportSessionJson, exportPromptMarkdown } from './exportSession.js'
export type { ExportOptions } from './exportSession.js'
