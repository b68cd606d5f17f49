export { loadSeederConfig } from './defaults';
