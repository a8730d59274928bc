export * from './environment.js'
export * from './ids.js'
export * from './outcome.js'
export * from './package.js'
export * from './skill.js'
export * from './workspace.js'
