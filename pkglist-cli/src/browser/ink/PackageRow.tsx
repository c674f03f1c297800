/**
 * One row of the package list: a package entry or one of its version rows.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { DOMElement } from 'ink';
import type { BrowserRow } from '../rows';
import { STATUS_GLYPHS, fitWidth, formatVersionLabel, progressLabel, truncate } from '../formatters';

interface PackageRowProps {
  row: BrowserRow;
  selected: boolean;
  width: number;
  onMount: (key: string, node: DOMElement | null) => void;
}

const NAME_WIDTH = 28;
const VERSION_WIDTH = 20;

export function PackageRow({ row, selected, width, onMount }: PackageRowProps): React.ReactElement {
  const { item } = row;
  const marker = selected ? '▸' : ' ';
  const ref = (node: DOMElement | null) => onMount(row.key, node);

  if (item.kind === 'version') {
    const label = `  └ ${formatVersionLabel(item.targetVersion)}`;
    return (
      <Box ref={ref} width={width} height={1}>
        <Text inverse={selected}>
          <Text bold>{marker}</Text>
          <Text color="gray">{fitWidth(label, Math.max(1, width - 1))}</Text>
        </Text>
      </Box>
    );
  }

  const { glyph, color } = STATUS_GLYPHS[item.statusIcon];
  const pkg = item.package;
  const progress = progressLabel(pkg.progress);
  const expander = item.versionItems.length === 0 ? ' ' : item.expanded ? '▾' : '▸';
  const descriptionWidth = Math.max(0, width - NAME_WIDTH - VERSION_WIDTH - 7);
  const detail = progress ? `${progress}...` : pkg.description;

  return (
    <Box ref={ref} width={width} height={1}>
      <Text inverse={selected}>
        <Text bold>{marker}</Text>
        <Text color={color}>{glyph}</Text>
        <Text color="gray">{expander} </Text>
        <Text bold={selected}>{fitWidth(pkg.displayName, NAME_WIDTH)}</Text>
        <Text color="cyan"> {fitWidth(formatVersionLabel(item.targetVersion), VERSION_WIDTH)}</Text>
        <Text color={progress ? 'cyan' : 'gray'}> {truncate(detail, descriptionWidth)}</Text>
      </Text>
    </Box>
  );
}
