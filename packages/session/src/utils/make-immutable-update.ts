import { create, type Patch } from "mutative"

/**
 * Creates an immutable TEA update function from an update function that uses
 * mutations (via `mutative`) to capture what state should change.
 *
 * The input mutates the model (draft) and returns only a Command. The wrapper
 * handles the immutability contract, and optionally reports patches.
 *
 * @param mutativeUpdate - Function that mutates the model and returns a command
 * @param onPatch - Optional callback to receive patches for debugging
 * @returns An update function that returns [Model, Command?]
 */
export function makeImmutableUpdate<Msg, Model, Command>(
  mutativeUpdate: (msg: Msg, model: Model) => Command | undefined,
  onPatch?: (patches: Patch[]) => void,
): (msg: Msg, model: Model) => [Model, Command | undefined] {
  return (msg: Msg, model: Model) => {
    let command: Command | undefined

    const result = create(
      model,
      draft => {
        command = mutativeUpdate(msg, draft as Model)
      },
      { enablePatches: !!onPatch },
    )

    // With patches enabled the result is [newModel, patches, inversePatches]
    const newModel = Array.isArray(result) ? result[0] : result
    const patches = Array.isArray(result) ? result[1] : []

    if (onPatch && patches.length > 0) {
      onPatch(patches)
    }

    return [newModel, command]
  }
}
