/** Thrown when a move token is not one of the 18 face turns. */
export class InvalidMoveError extends Error {
  readonly move: string;

  constructor(move: string) {
    super(`Invalid move: ${move}`);
    this.name = "InvalidMoveError";
    this.move = move;
  }
}

/** Thrown when a cube string does not split into exactly 24 stickers. */
export class MalformedCubeError extends Error {
  readonly stickerCount: number;

  constructor(stickerCount: number) {
    super(`Expected 24 stickers, got ${stickerCount}`);
    this.name = "MalformedCubeError";
    this.stickerCount = stickerCount;
  }
}
