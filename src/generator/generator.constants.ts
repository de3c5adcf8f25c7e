export const LABEL_PREFIX = 'io.shardplane';

export const LABEL_CLUSTER = `${LABEL_PREFIX}.cluster`;
export const LABEL_NODE = `${LABEL_PREFIX}.node`;
export const LABEL_ROLE = `${LABEL_PREFIX}.role`;
export const LABEL_INDEX = `${LABEL_PREFIX}.index`;
export const LABEL_HOST = `${LABEL_PREFIX}.host`;
export const LABEL_PORT = `${LABEL_PREFIX}.port`;

export const REDACTED_VALUE = '********';
export const SECRET_ENVIRONMENT_KEYS = ['POSTGRES_PASSWORD'];
