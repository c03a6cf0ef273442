import type {Command} from 'commander'

export type GlobalOptions = {
  json?: boolean;
  config?: string;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}
