import { render, screen } from '@testing-library/react';
import { describe, it, expect, vi } from 'vitest';
import ErrorBoundary from './ErrorBoundary';

function Broken(): JSX.Element {
  throw new Error('dialog layout missing');
}

describe('ErrorBoundary', () => {
  it('renders children when nothing throws', () => {
    render(
      <ErrorBoundary>
        <p>All good</p>
      </ErrorBoundary>
    );
    expect(screen.getByText('All good')).toBeTruthy();
  });

  it('shows the error and logs it', () => {
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    render(
      <ErrorBoundary>
        <Broken />
      </ErrorBoundary>
    );
    expect(screen.getByRole('alert').textContent).toContain('dialog layout missing');
    expect(errSpy).toHaveBeenCalledWith('[ErrorBoundary]', expect.any(Error), expect.anything());
    errSpy.mockRestore();
  });
});
