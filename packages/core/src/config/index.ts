export { ENV_FILENAME, parseEnvToml } from './env-toml.js'
export {
  WORKSPACE_ENV_VAR,
  WORKSPACE_FILENAME,
  findWorkspaceRoot,
  parseWorkspaceToml,
  readWorkspaceToml,
  toPackageManifests,
  toSkillDefinitions,
} from './workspace-toml.js'
