import type { ReactNode } from 'react';
import { render, screen, fireEvent } from '@testing-library/react';
import { describe, it, expect, vi } from 'vitest';
import AboutDialog from '.';

vi.mock('@headlessui/react', () => {
  const Passthrough = ({ children }: { children?: ReactNode }) => <>{children}</>;
  const Dialog = Object.assign(
    ({ children }: { children?: ReactNode }) => <div role="dialog">{children}</div>,
    {
      Panel: Passthrough,
      Title: ({ children }: { children?: ReactNode }) => <h2>{children}</h2>,
    }
  );
  const Transition = ({ show, children }: { show?: boolean; children?: ReactNode }) =>
    show ? <>{children}</> : null;
  return { Dialog, Transition };
});

describe('AboutDialog', () => {
  it('shows the help message and closes', () => {
    const onClose = vi.fn();
    render(<AboutDialog isOpen onClose={onClose} />);
    expect(screen.getByRole('heading', { name: "Need help? We're here." })).toBeTruthy();
    fireEvent.click(screen.getByRole('button', { name: 'Close' }));
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
