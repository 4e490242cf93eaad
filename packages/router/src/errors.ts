export type RouterErrorCode = 'route_tree_invalid' | 'registry_frozen';

export class RouterError extends Error {
  public readonly code: RouterErrorCode;

  public constructor(code: RouterErrorCode, message: string) {
    super(message);
    this.name = 'RouterError';
    this.code = code;
  }
}
