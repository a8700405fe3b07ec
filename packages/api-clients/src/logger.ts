import { createLogger } from '@coinlens/utils';

export const logger = createLogger('@coinlens/api-clients');
