import { render, useApp } from 'ink';
import { type ReactNode, useEffect } from 'react';

import { ConfirmPrompt } from '@/bundle/ui/confirm.prompt';

const RenderOnce = ({ children }: { children: ReactNode }) => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  return <>{children}</>;
};

/** Renders a finished report to stdout and returns once Ink has flushed it. */
export const renderReport = async (node: ReactNode): Promise<void> => {
  const { waitUntilExit } = render(<RenderOnce>{node}</RenderOnce>);
  await waitUntilExit();
};

export const askConfirmation = async (question: string): Promise<boolean> => {
  // Ink needs raw mode for key input.
  if (!process.stdin.isTTY) {
    return false;
  }

  let answer = false;
  const { waitUntilExit } = render(
    <ConfirmPrompt
      question={question}
      onAnswer={(value) => {
        answer = value;
      }}
    />,
  );

  await waitUntilExit();
  return answer;
};
