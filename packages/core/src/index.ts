export type PackageName = `@widefmt/${string}`;

export interface PackageManifest {
  readonly name: PackageName;
  readonly summary: string;
}

export type FrozenManifest<T extends PackageManifest = PackageManifest> = Readonly<T>;

export const createPackageManifest = <T extends PackageManifest>(
  manifest: T,
): FrozenManifest<T> => Object.freeze({ ...manifest });

export {
  createFormatter,
  format,
  Formatter,
  FormatterOptionsError,
  sprintf,
  type FormatterOptions,
} from './format/formatter.js';

export {
  array,
  bool,
  byte,
  byteArray,
  bytes,
  complex64,
  complex128,
  float32,
  float64,
  int,
  int8,
  int16,
  int32,
  int64,
  integer,
  list,
  nil,
  nilPointer,
  pointer,
  rune,
  str,
  typeName,
  uint,
  uint8,
  uint16,
  uint32,
  uint64,
  uintptr,
} from './values/constructors.js';
export {
  toFormatValue,
  typeNameOf,
  type BooleanValue,
  type BytesValue,
  type ComplexValue,
  type FloatValue,
  type FormatArgument,
  type FormatValue,
  type FormatValueKind,
  type IntegerType,
  type IntegerValue,
  type ListValue,
  type NilValue,
  type NumberValue,
  type PointerValue,
  type StringValue,
  type TypeValue,
} from './values/format-value.js';

export {
  codePointColumns,
  createColumnMeasure,
  stringColumns,
  type ColumnOptions,
  type ColumnWidth,
} from './width/columns.js';

export {
  createCollectingDiagnosticsPort,
  createNullDiagnosticsPort,
  DiagnosticCodes,
  type CollectingDiagnosticsPort,
  type DiagnosticCode,
  type DiagnosticsPort,
  type FormatDiagnostic,
} from './instrumentation/diagnostics.js';

export {
  createLevelFilter,
  JsonLineLogger,
  noopLogger,
  type LineOutput,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  ConfigNotFoundError,
  DEFAULT_FORMATTER_SETTINGS,
  DEFAULT_WIDEFMT_CONFIG_FILES,
  describeSettingsIssues,
  findConfigPath,
  FormatterConfigError,
  formatterSettingsSchema,
  loadConfigModule,
  loadFormatterConfig,
  resolveConfigPath,
  type FormatterSettings,
  type FormatterSettingsInput,
  type LoadedConfigModule,
  type LoadedFormatterConfig,
  type ResolveConfigPathOptions,
} from './config/index.js';

const manifestDefinition = {
  name: '@widefmt/core',
  summary: 'Formatting engine: directive scanning, verb rendering, and display-width padding.',
} as const satisfies PackageManifest;

export const manifest = createPackageManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
