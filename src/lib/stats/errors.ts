export type RecordKind = "player" | "game" | "batting" | "pitching";

export class RecordNotFoundError extends Error {
  readonly kind: RecordKind;
  readonly id: number;

  constructor(kind: RecordKind, id: number) {
    super(`${kind} ${id} not found`);
    this.name = "RecordNotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

export class DuplicatePlayerError extends Error {
  readonly playerName: string;

  constructor(playerName: string) {
    super(`A player named "${playerName}" already exists`);
    this.name = "DuplicatePlayerError";
    this.playerName = playerName;
  }
}
