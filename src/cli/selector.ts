import { Output, Prompter } from './prompter';

const CHOICE_PATTERN = /^\d+$/;

/**
 * Shows a 1-indexed menu and waits for one valid choice. Blank input picks the
 * first entry; anything else invalid is re-prompted with no attempt limit.
 * Returns the chosen index, or null if input ends before a choice is made.
 */
export async function selectFromMenu<T>(
  items: readonly T[],
  describe: (item: T) => string,
  prompter: Prompter,
  output: Output,
  heading = 'Multiple matches found:'
): Promise<number | null> {
  if (!items.length) {
    return null;
  }
  if (items.length === 1) {
    return 0;
  }

  output.write(heading);
  items.forEach((item, index) => output.write(`${index + 1}. ${describe(item)}`));

  for (;;) {
    const answer = await prompter.ask(`Select 1-${items.length} (or Enter to pick 1): `);
    if (answer === null) {
      return null;
    }

    const choice = answer.trim();
    if (!choice) {
      return 0;
    }
    if (CHOICE_PATTERN.test(choice)) {
      const selected = Number(choice);
      if (selected >= 1 && selected <= items.length) {
        return selected - 1;
      }
    }
    output.write('Invalid choice; try again.');
  }
}
