import { Box, Text, useApp, useInput } from 'ink';
import { useState } from 'react';

import { COLORS } from '@/bundle/ui/theme';

type ConfirmPromptProps = {
  question: string;
  onAnswer: (answer: boolean) => void;
};

export const ConfirmPrompt = ({ question, onAnswer }: ConfirmPromptProps) => {
  const { exit } = useApp();
  const [answered, setAnswered] = useState<boolean | null>(null);

  useInput((input, key) => {
    if (answered !== null) {
      return;
    }

    const value = input.toLowerCase() === 'y';
    if (value || input.toLowerCase() === 'n' || key.return || key.escape || (key.ctrl && input === 'c')) {
      setAnswered(value);
      onAnswer(value);
      exit();
    }
  });

  return (
    <Box flexDirection="column">
      <Text color={COLORS.amber}>
        {question} <Text color={COLORS.muted}>[y/N]</Text>
      </Text>
      {answered !== null && (
        <Text color={answered ? COLORS.success : COLORS.muted}>{answered ? 'yes' : 'no'}</Text>
      )}
    </Box>
  );
};
