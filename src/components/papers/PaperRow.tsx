import React from 'react';
import { Box, Text } from 'ink';

import { SearchResult } from '../../types';
import { formatAuthors } from '../../lib/links';

export const HIGHLIGHT_SYMBOL = '>> ';

// Column widths; the seen mark gets a fixed two-cell glyph plus a gap
export const COLUMN_WIDTHS = {
  seen: 3,
  title: '32%',
  summary: '38%',
  authors: '16%',
  date: '6%',
} as const;

interface PaperRowProps {
  paper: SearchResult;
  seen: boolean;
  selected: boolean;
  height: number;
}

export const PaperRow: React.FC<PaperRowProps> = ({ paper, seen, selected, height }) => {
  const cells = [
    { key: 'seen', width: COLUMN_WIDTHS.seen, text: seen ? '✅' : '❌' },
    { key: 'title', width: COLUMN_WIDTHS.title, text: paper.title },
    { key: 'summary', width: COLUMN_WIDTHS.summary, text: paper.summary },
    { key: 'authors', width: COLUMN_WIDTHS.authors, text: formatAuthors(paper.authors) },
    { key: 'date', width: COLUMN_WIDTHS.date, text: paper.updated },
  ];

  return (
    <Box height={height} marginBottom={1} overflow="hidden">
      <Box width={HIGHLIGHT_SYMBOL.length} flexShrink={0}>
        <Text>{selected ? HIGHLIGHT_SYMBOL : ' '.repeat(HIGHLIGHT_SYMBOL.length)}</Text>
      </Box>
      {cells.map((cell) => (
        <Box key={cell.key} width={cell.width} paddingRight={1} overflow="hidden">
          <Text inverse={selected}>{cell.text}</Text>
        </Box>
      ))}
    </Box>
  );
};
