import { Program } from '../ast';

/** A parsed document, remembered with the path its diagnostics refer to. */
export interface SourceProgram {
  source: string;
  program: Program;
}
