/**
 * @fileclassify/build
 *
 * Release build layer.
 *
 * Responsibilities:
 * - Install the dependencies a manifest declares
 * - Bundle the application into one entry file
 * - Package the entry point into a single windowed executable
 * - Report the outcome
 */

export {
  buildConfigSchema,
  parseBuildConfig,
  loadBuildConfig,
  type BuildConfigFile,
  type PackagerFlags,
  type ResolvedBuildConfig,
} from './config.js';

export {
  parseDependencyManifest,
  readDependencyManifest,
  type DependencyKind,
  type DependencySpec,
  type DependencyManifest,
} from './manifest.js';

export {
  DependencyInstaller,
  DEFAULT_INSTALL_ARGS,
  type InstallOptions,
  type InstallResult,
} from './installer.js';

export { EntryBundler, type BundleOptions, type BundleResult } from './bundler.js';

export {
  readWindowsSubsystem,
  setWindowsSubsystem,
  WINDOWS_SUBSYSTEM,
  type WindowsSubsystem,
} from './peSubsystem.js';

export {
  PkgTool,
  FlagPackagerTool,
  type PackagerRequest,
  type PackagerTool,
} from './packagerTools.js';

export { ExecutablePackager, type PackageOptions, type PackageOutcome } from './packager.js';

export { runTool } from './tool.js';

export {
  runBuild,
  createPackagerTool,
  formatBuildReport,
  type BuildStage,
  type BuildReport,
  type BuildDependencies,
} from './pipeline.js';
