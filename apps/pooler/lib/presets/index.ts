export {
  interpolateEnvVars,
  loadPresetFile,
  loadPresetsFromDir,
  resolveTemplate,
  PresetValidationError,
  type PresetLoadOptions,
} from './loader'
