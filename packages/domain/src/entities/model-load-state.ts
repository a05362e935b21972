export type ModelLoadState = 'not_started' | 'loading' | 'ready' | 'error';

export type ModelStatus =
  | { status: 'not_started' | 'loading'; message: string }
  | { status: 'ready' }
  | { status: 'error'; message: string };
