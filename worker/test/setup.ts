import { setLogLevel } from '../services/logService';

setLogLevel('silent');
