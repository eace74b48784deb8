export type InterpreterSource = 'override' | 'local' | 'system';

export interface ResolvedInterpreter {
  source: InterpreterSource;
  path: string;
}

export interface LaunchPlan {
  interpreter: ResolvedInterpreter;
  script: string;
  args: string[];
}
