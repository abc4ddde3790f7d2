/**
 * application/default-directory.ts
 *
 * Directory that file and folder pickers of a render session start in.
 */

import { formatOptionValue, type LayeredConfigStore } from '../domain/config-layers'
import type { GameContext } from './ports'

export type DefaultDirectoryContext = {
  game: GameContext | null
  store: LayeredConfigStore | null
  homeDirectory: string
}

/**
 * In order: the game's own directory, the working directory of the game's
 * runner, the global `game_path` system option, the user's home.
 */
export function resolveDefaultDirectory(ctx: DefaultDirectoryContext): string {
  if (ctx.game?.directory) return ctx.game.directory
  if (ctx.game?.runner?.workingDirectory) return ctx.game.runner.workingDirectory

  if (ctx.store) {
    const gamePath = formatOptionValue(ctx.store.layer('system').effective.get('game_path'))
    if (gamePath) return gamePath
  }
  return ctx.homeDirectory
}
