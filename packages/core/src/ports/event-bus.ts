export type EventHandler<T = unknown> = (payload: T) => void;

export interface IEventBus {
  emit(event: string, payload: unknown): void;
  on(event: string, handler: EventHandler): () => void;
  once(event: string, handler: EventHandler): void;
}
