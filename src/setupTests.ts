import { initLogging } from './logging';

initLogging({ minLevel: 'silent' });
