import { Command } from 'commander';
import { createConfigLoader, type ConfigLoader, type ConfigLoaderOptions } from '../loader';
import type { PydustConfig } from '../pydustConfig';

type GlobalOptions = {
  cwd?: string;
};

type ShowOptions = {
  json?: boolean;
};

export type InterfaceOptions = {
  loaderFactory?: (options: ConfigLoaderOptions) => ConfigLoader;
  write?: (line: string) => void;
};

function formatConfig(config: PydustConfig): string[] {
  const json = config.toJSON();
  const lines = [
    `zig_exe:          ${json.zigExe ?? '(default)'}`,
    `build_zig:        ${json.buildZig}`,
    `pydust_build_zig: ${json.pydustBuildZig}`,
    `zig_tests:        ${json.zigTests}`,
    `self_managed:     ${json.selfManaged}`,
    `ext_modules:      ${json.extModules.length}`
  ];
  for (const module of json.extModules) {
    lines.push(`  - ${module.name}`);
    lines.push(`      root:         ${module.root}`);
    lines.push(`      limited_api:  ${module.limitedApi}`);
    lines.push(`      install_path: ${module.installPath ?? '(unsupported)'}`);
    lines.push(`      test_bin:     ${module.testBin}`);
  }
  return lines;
}

export function createInterface(options: InterfaceOptions = {}): Command {
  const program = new Command();
  const loaderFactory = options.loaderFactory ?? createConfigLoader;
  const write = options.write ?? ((line: string) => console.log(line));

  program
    .name('pydust-config')
    .description('Inspect and validate the [tool.pydust] section of pyproject.toml')
    .option('--cwd <dir>', 'Project directory containing pyproject.toml');

  function loadConfig(): PydustConfig {
    const globals = program.opts<GlobalOptions>();
    return loaderFactory({ cwd: globals.cwd }).load();
  }

  program
    .command('show')
    .description('Print the resolved configuration and derived paths')
    .option('--json', 'Output JSON')
    .action((commandOptions: ShowOptions) => {
      const config = loadConfig();
      if (commandOptions.json) {
        write(JSON.stringify(config.toJSON(), null, 2));
        return;
      }
      for (const line of formatConfig(config)) {
        write(line);
      }
    });

  program
    .command('check')
    .description('Validate pyproject.toml, including the build-system version pin')
    .action(() => {
      const config = loadConfig();
      write(`pyproject.toml is valid (${config.extModules.length} extension module(s))`);
    });

  return program;
}
