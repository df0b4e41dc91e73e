import { parseCliArgs } from './cliArgs';
import { parseSimulationConfig } from './config';
import { ConfigurationError, UsageError } from './errors';
import { formatReport } from './report';
import { runSimulation } from './run';

function main() {
  try {
    const config = parseSimulationConfig(parseCliArgs(process.argv.slice(2)));
    const set = runSimulation(config);
    console.log(formatReport(set, config.detailDays));
  } catch (error) {
    if (error instanceof UsageError || error instanceof ConfigurationError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

main();
