export * from './session.js'
export * from './promptVersion.js'
export * from './runResult.js'
export * from './feedback.js'
