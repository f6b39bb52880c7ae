export { PAYLOAD_DIR, TransferBagError, unpackTransferBag } from './unpack.js';
export type { UnpackResult } from './unpack.js';
