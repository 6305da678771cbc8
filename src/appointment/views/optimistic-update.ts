/** Contenedor mutable del estado local de una vista. */
export interface StateCell<T> {
  get(): T;
  set(value: T): void;
}

export interface OptimisticPatch<TState, TSnapshot> {
  state: TState;
  snapshot: TSnapshot;
}

/**
 * Cambio local en tres pasos: se aplica antes de llamar al servidor y después
 * se confirma con la respuesta o se deshace con el snapshot.
 *
 * `commit` y `revert` reciben el estado vigente en ese momento, no el que
 * había al aplicar, para no pisar otros cambios que hayan ocurrido mientras
 * tanto.
 */
export interface OptimisticUpdate<TState, TResult, TSnapshot> {
  apply(state: TState): OptimisticPatch<TState, TSnapshot>;
  commit(state: TState, result: TResult): TState;
  revert(state: TState, snapshot: TSnapshot): TState;
}

export async function runOptimistic<TState, TResult, TSnapshot>(
  cell: StateCell<TState>,
  action: () => Promise<TResult>,
  update: OptimisticUpdate<TState, TResult, TSnapshot>,
): Promise<TResult> {
  const { state, snapshot } = update.apply(cell.get());

  cell.set(state);

  try {
    const result = await action();

    cell.set(update.commit(cell.get(), result));
    return result;
  } catch (error: unknown) {
    cell.set(update.revert(cell.get(), snapshot));
    throw error;
  }
}
