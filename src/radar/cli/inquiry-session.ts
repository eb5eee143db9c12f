import { InquiryTurn } from '../types/radar.types';

export interface InquirySessionIo {
  lines: AsyncIterable<string>;
  write: (text: string) => void;
  prompt?: () => void;
}

export interface InquiryAsker {
  ask(question: string): Promise<InquiryTurn>;
}

const EXIT_COMMANDS = new Set(['exit', 'quit']);

/** Reads questions until `exit`, `quit` or end of input. Returns the number of questions asked. */
export async function runInquirySession(
  inquisitor: InquiryAsker,
  io: InquirySessionIo,
): Promise<number> {
  let asked = 0;
  io.prompt?.();
  for await (const line of io.lines) {
    const question = line.trim();
    if (EXIT_COMMANDS.has(question.toLowerCase())) {
      break;
    }
    if (question) {
      asked += 1;
      io.write(formatTurn(await inquisitor.ask(question)));
    }
    io.prompt?.();
  }
  return asked;
}

export function formatTurn(turn: InquiryTurn): string {
  if (turn.status === 'failed') {
    return `[failed at ${turn.stage}] ${turn.reason}\n`;
  }
  const lines = [turn.answer];
  if (turn.sources.length > 0) {
    lines.push('', 'Sources:');
    turn.sources.forEach((source, index) => {
      lines.push(
        `[${index + 1}] ${source.title} (${source.criticality}, ${source.similarity.toFixed(2)}) ${source.identity}`,
      );
    });
  }
  return `${lines.join('\n')}\n`;
}
