/**
 * Hook that returns the dimensions of Ink's output stream and re-renders on resize.
 */

import { useState, useEffect } from 'react';
import { useStdout } from 'ink';

interface TerminalSize {
  columns: number;
  rows: number;
}

function readSize(stream: NodeJS.WriteStream): TerminalSize {
  return {
    columns: stream.columns || 80,
    rows: stream.rows || 24,
  };
}

export function useTerminalSize(): TerminalSize {
  const { stdout } = useStdout();
  const [size, setSize] = useState<TerminalSize>(() => readSize(stdout));

  useEffect(() => {
    const onResize = () => setSize(readSize(stdout));
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  return size;
}
