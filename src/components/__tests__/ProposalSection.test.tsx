// @vitest-environment jsdom
import React from 'react';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { cleanup, fireEvent, render, screen, within } from '@testing-library/react';
import { ProposalSection } from '../ProposalSection';
import { createMemoryStorage, createSessionContext } from '../../utils/session';
import { currency } from '../../utils/formatting';
import { SESSION_KEYS } from '../../config';

afterEach(() => {
  cleanup();
  vi.restoreAllMocks();
});

describe('ProposalSection', () => {
  it('shows the fee for the default project', () => {
    render(<ProposalSection session={createSessionContext()} />);
    expect(screen.getByTestId('ratio').textContent).toBe('0.7200');
    expect(screen.getByTestId('price-base').textContent).toBe(currency(77760));
    expect(screen.getByTestId('price-total').textContent).toBe(currency(77760));
    expect(screen.getByTestId('schedule-total-pct').textContent).toBe('100.00%');
    expect(screen.queryByRole('alert')).toBeNull();
  });

  it('starts from values already in the session', () => {
    const session = createSessionContext(createMemoryStorage({
      'feeProposal.totalArea': '10000',
      'feeProposal.nonRepeatedArea': '10000',
      'feeProposal.repeatedArea': '0',
    }));
    render(<ProposalSection session={session} />);
    expect(screen.getByTestId('ratio').textContent).toBe('1.0000');
    expect(screen.getByTestId('price-total').textContent).toBe(currency(216000));
  });

  it('writes the latest outputs back to the session', () => {
    const session = createSessionContext();
    render(<ProposalSection session={session} />);
    expect(session.getNumber(SESSION_KEYS.lastRatio)).toBeCloseTo(0.72, 12);
    expect(session.getNumber(SESSION_KEYS.lastPriceTotal)).toBeCloseTo(77760, 6);
    expect(session.getNumber('totalArea')).toBe(5000);
  });

  it('applies the surcharge once it is switched on', () => {
    render(<ProposalSection session={createSessionContext()} />);
    fireEvent.click(screen.getByLabelText('Apply additional surcharge (BDI)'));
    fireEvent.change(screen.getByLabelText('Surcharge (% of PV)'), { target: { value: '10' } });
    expect(screen.getByTestId('price-base').textContent).toBe(currency(77760));
    expect(screen.getByTestId('price-total').textContent).toBe(currency(85536));
  });

  it('warns when the stage percentages stop adding up to 100', () => {
    render(<ProposalSection session={createSessionContext()} />);
    fireEvent.change(screen.getByLabelText('Assinatura percentage'), { target: { value: '20' } });
    expect(screen.getByTestId('schedule-total-pct').textContent).toBe('110.00%');
    expect(screen.getByRole('alert').textContent).toContain(
      'Stage percentages add up to 110%; they must total exactly 100%.',
    );
  });

  it('restores a preset when one is chosen', () => {
    render(<ProposalSection session={createSessionContext()} />);
    fireEvent.change(screen.getByLabelText('Payment schedule'), { target: { value: 'without_basic_design' } });
    expect(screen.queryByLabelText('Projeto Básico percentage')).toBeNull();
    expect(screen.getByTestId('schedule-total-pct').textContent).toBe('100.00%');
  });

  it('carries a computed BH over when switching back to a manual rate', () => {
    const session = createSessionContext();
    render(<ProposalSection session={session} />);
    const unitRateMode = within(screen.getByRole('group', { name: 'Unit rate mode' }));
    fireEvent.click(unitRateMode.getByRole('button', { name: 'From cost index' }));
    expect(session.getNumber(SESSION_KEYS.lastUnitRate)).toBe(1800);

    fireEvent.click(unitRateMode.getByRole('button', { name: 'Manual' }));
    const field = screen.getByLabelText('BH (R$/m²)');
    expect(field instanceof HTMLInputElement && field.value).toBe('1800');
    expect(screen.getByTestId('price-total').textContent).toBe(currency(1166400));
  });

  it('shows the outputs a previous run left in the session', () => {
    const session = createSessionContext(createMemoryStorage({
      'feeProposal.lastRatio': '0.5',
      'feeProposal.lastPriceTotal': '50000',
    }));
    render(<ProposalSection session={session} />);
    expect(screen.getByTestId('previous-run').textContent).toBe(
      `Previous run in this session: R 0.5000, PV total ${currency(50000)}`,
    );
  });

  it('omits the previous run on a fresh session', () => {
    render(<ProposalSection session={createSessionContext()} />);
    expect(screen.queryByTestId('previous-run')).toBeNull();
  });

  it('ignores a stored schedule with the wrong shape', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = createSessionContext(createMemoryStorage({ 'feeProposal.scheduleShares': '{}' }));
    render(<ProposalSection session={session} />);
    expect(screen.getByTestId('schedule-total-pct').textContent).toBe('100.00%');
    expect(screen.getByLabelText('Assinatura percentage')).toBeTruthy();
    expect(warn).toHaveBeenCalled();
  });
});
