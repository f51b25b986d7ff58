export class ToastConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToastConfigError';
  }
}
