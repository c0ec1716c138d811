export { SimulatorError, SimulatorErrorCode } from './errors';
