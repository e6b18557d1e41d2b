import process from 'node:process';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import type { CliIo } from '../../io/cli-io.js';
import type { CliKernel } from '../../kernel/types.js';
import { columnsCommandModule } from '../columns/columns-command-module.js';
import { printfCommandModule } from '../printf/printf-command-module.js';

export interface CreateWidefmtCliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export const createWidefmtCliKernel = (options: CreateWidefmtCliKernelOptions): CliKernel =>
  createCliKernel(options).register(printfCommandModule).register(columnsCommandModule);

export interface RunWidefmtCliOptions extends CreateWidefmtCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runWidefmtCli = async ({
  argv = process.argv,
  programName,
  version,
  description,
  io,
}: RunWidefmtCliOptions): Promise<number> => {
  const kernel = createWidefmtCliKernel({ programName, version, description, io });
  return kernel.run(argv);
};
