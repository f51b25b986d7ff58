/** How long a toast stays on screen, in seconds. */
export const ToastLength = {
  SHORT: 2,
  LONG: 3.5,
} as const;

export type ToastLength = (typeof ToastLength)[keyof typeof ToastLength];
