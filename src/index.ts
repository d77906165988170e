import { startServer } from './server';
import { handleError } from './utils/errorHandler';

startServer().catch(error => {
  handleError(error, 'startup');
  process.exit(1);
});
