import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { TutorialModal } from './TutorialModal';

describe('TutorialModal', () => {
    it('renders nothing when closed', () => {
        const { container } = render(<TutorialModal isOpen={false} onClose={vi.fn()} />);
        expect(container).toBeEmptyDOMElement();
    });

    it('closes from the confirmation button and the close icon', async () => {
        const onClose = vi.fn();
        render(<TutorialModal isOpen onClose={onClose} />);

        expect(screen.getByRole('dialog', { name: /welcome to the toulouse water & rainfall explorer/i })).toBeInTheDocument();

        await userEvent.click(screen.getByRole('button', { name: 'Got it!' }));
        await userEvent.click(screen.getByRole('button', { name: 'Close tutorial' }));
        expect(onClose).toHaveBeenCalledTimes(2);
    });
});
