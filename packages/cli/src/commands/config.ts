import { Command } from 'commander';
import { ConfigManager, CONFIG_FILE_NAMES } from '@cairn/core';

export const configCommand = new Command('config')
  .description('Manage Cairn configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: { config?: string }) => {
    const mgr = new ConfigManager();
    const config = await mgr.load(options.config ? { configPath: options.config } : {});
    const redacted = {
      ...config,
      providers: Object.fromEntries(
        Object.entries(config.providers).map(([name, value]) => [
          name,
          value && typeof value === 'object' && 'apiKey' in value ? { ...value, apiKey: '***' } : value,
        ]),
      ),
    };
    console.log(`# source: ${mgr.getSource() ?? 'defaults'}`);
    console.log(JSON.stringify(redacted, null, 2));
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    console.log('  CAIRN_PRESET');
    console.log('  CAIRN_BUDGET');
    console.log('  CAIRN_STRATEGY');
    console.log('  CAIRN_STORE_BACKEND');
    console.log('  CAIRN_DB_PATH');
    console.log('  CAIRN_SEMANTIC_MATCHING');
    console.log('  CAIRN_ANTHROPIC_API_KEY');
    console.log('  CAIRN_OPENAI_API_KEY');
    console.log('  CAIRN_OLLAMA_URL');
    console.log('  CAIRN_LOG_LEVEL');
  });
