type Listener<T> = (payload: T) => void;
type ListenerMap<E> = { [K in keyof E]?: Set<Listener<E[K]>> };

/** Minimal typed listener registry shared by the state classes. */
export class Emitter<E> {
  private _listeners: ListenerMap<E> = {};

  on<K extends keyof E>(event: K, fn: Listener<E[K]>): void {
    const set = this._listeners[event] ?? new Set<Listener<E[K]>>();
    set.add(fn);
    this._listeners[event] = set;
  }

  off<K extends keyof E>(event: K, fn: Listener<E[K]>): void {
    this._listeners[event]?.delete(fn);
  }

  emit<K extends keyof E>(event: K, payload: E[K]): void {
    this._listeners[event]?.forEach(fn => fn(payload));
  }
}
