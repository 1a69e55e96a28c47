import { Command } from 'commander';
import { AdminContext } from './context';
import { addSubscriptionCommands } from './commands/subscriptions';
import { addStateCommands } from './commands/state';

export function buildProgram(createContext: () => AdminContext): Command {
  let context: AdminContext | undefined;
  // Commands build the context on first use so --help needs no credentials
  const getContext = () => {
    if (!context) {
      context = createContext();
    }
    return context;
  };

  const program = new Command();

  program
    .name('relay-admin')
    .description('Operator CLI for the Strava to Discord activity relay')
    .version('1.0.0');

  addSubscriptionCommands(program, getContext);
  addStateCommands(program, getContext);

  return program;
}
