import { initLogger } from '../utils/logger.js';

initLogger({ silent: true });
