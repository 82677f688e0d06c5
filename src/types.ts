export type Cmd = Arg[];
export type Arg = string | number | Uint8Array;
export type ParsedCmd = [cmd: string, ...args: Uint8Array[]];
