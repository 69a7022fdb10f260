//fixed-grammar parser for review commands, independent of the transport that delivers them
//  resolved <externalRecordId> | status | pending   (optional leading "!" or "/")

export type ReviewCommand =
  | { type: 'resolved'; externalRecordId: string }
  | { type: 'status' }
  | { type: 'pending' }
  | { type: 'unrecognized'; text: string };

export const COMMAND_USAGE = 'Commands: resolved <record-id> | status | pending';

const RECORD_ID = /^[A-Za-z0-9_-]+$/;

export function parseCommand(text: string): ReviewCommand {
  const tokens = text.trim().replace(/^[!/]/, '').split(/\s+/).filter(Boolean);
  const [keyword = '', ...args] = tokens;

  switch (keyword.toLowerCase()) {
    case 'resolved': {
      const [id] = args;
      return args.length === 1 && id !== undefined && RECORD_ID.test(id)
        ? { type: 'resolved', externalRecordId: id }
        : { type: 'unrecognized', text };
    }
    case 'status':
      return args.length === 0 ? { type: 'status' } : { type: 'unrecognized', text };
    case 'pending':
      return args.length === 0 ? { type: 'pending' } : { type: 'unrecognized', text };
    default:
      return { type: 'unrecognized', text };
  }
}
