/**
 * Interactive backend picker using ink
 */

import React, { useRef, useState } from "react";
import { Box, Text, useInput } from "ink";
import SelectInput from "ink-select-input";
import type { BackendOption } from "../bootstrap/backends.js";

interface SelectPromptProps<T extends string> {
  message: string;
  items: Array<{ label: string; value: T; description?: string }>;
  onSelect: (value: T) => void;
}

function SelectPrompt<T extends string>({ message, items, onSelect }: SelectPromptProps<T>) {
  const [selectedIndex, setSelectedIndex] = useState(0);
  const selected = useRef(false);

  const choose = (value: T) => {
    if (selected.current) return;
    selected.current = true;
    onSelect(value);
  };

  // Number keys pick the matching entry directly
  useInput((input) => {
    const index = Number.parseInt(input, 10) - 1;
    const item = items[index];
    if (/^[1-9]$/.test(input) && item) {
      choose(item.value);
    }
  });

  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text color="cyan">? </Text>
        <Text>{message}</Text>
      </Box>
      <SelectInput
        items={items}
        onSelect={(item) => choose(item.value)}
        onHighlight={(item) => {
          const idx = items.findIndex((i) => i.value === item.value);
          if (idx !== -1) setSelectedIndex(idx);
        }}
      />
      {items[selectedIndex]?.description && (
        <Box marginTop={1}>
          <Text dimColor>  {items[selectedIndex]?.description}</Text>
        </Box>
      )}
    </Box>
  );
}

export function BackendMenu({
  options,
  onSelect,
}: {
  options: readonly BackendOption[];
  onSelect: (choice: string) => void;
}) {
  return (
    <SelectPrompt<string>
      message="Select a database backend"
      items={options.map((option) => ({
        label: `${option.choice}) ${option.label}`,
        value: option.choice,
        description: option.description,
      }))}
      onSelect={onSelect}
    />
  );
}
