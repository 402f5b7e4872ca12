export { cuidController, CuidController } from './cuid.controller';
