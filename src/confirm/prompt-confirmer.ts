import prompts from 'prompts';

/**
 * Asks the user a yes/no question
 */
export type Confirm = (message: string) => Promise<boolean>;

/**
 * Terminal confirmation, defaults to "no". Cancelling (Ctrl+C, Esc) counts as "no".
 */
export const promptConfirm: Confirm = async (message) => {
  const response: { confirmed?: boolean } = await prompts({
    type: 'confirm',
    name: 'confirmed',
    message,
    initial: false,
  });
  return response.confirmed === true;
};
