export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo, type CliProcess } from './io/process-cli-io.js';
export type { CliIo } from './io/cli-io.js';
export { createCliLogger, PrettyLineLogger } from './logging/cli-logger.js';
export {
  createPrintfCommandModule,
  printfCommandModule,
  STRICT_FAILURE_EXIT_CODE,
  type PrintfCommandDependencies,
} from './tools/printf/printf-command-module.js';
export { parseValueLiteral, ValueLiteralError } from './tools/printf/value-literals.js';
export {
  columnsCommandModule,
  createColumnsCommandModule,
} from './tools/columns/columns-command-module.js';
export {
  createSettingsLoader,
  type CommandSettingsDependencies,
  type LoadConfigRequest,
  type SettingsOverrides,
} from './tools/settings/command-settings.js';
export { formatCliError, type FormatCliErrorOptions } from './utils/format-cli-error.js';
export {
  createWidefmtCliKernel,
  runWidefmtCli,
  type CreateWidefmtCliKernelOptions,
  type RunWidefmtCliOptions,
} from './tools/widefmt/run-widefmt-cli.js';
