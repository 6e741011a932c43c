export const EXIT_SUCCESS = 0;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_NOT_FOUND = 3;
export const EXIT_RUNTIME_ERROR = 4;

export const DEFAULT_GRAPH_NAME = 'example';
