import { buildProgram } from './program';
import { createAdminContext } from './context';

buildProgram(createAdminContext)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
