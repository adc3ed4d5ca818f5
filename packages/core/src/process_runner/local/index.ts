export { LocalProcessRunner } from './local_process_runner';
