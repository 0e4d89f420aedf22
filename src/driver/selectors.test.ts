import { describe, expect, it } from 'vitest';

import { by } from '../schema/locator.js';
import { describeLocator } from './selectors.js';

describe('describeLocator', () => {
  it.each([
    [by.id('login'), '#login'],
    [by.css('button.primary'), 'button.primary'],
    [by.xpath('//a[1]'), 'xpath=//a[1]'],
    [by.name('email'), '[name="email"]'],
    [by.className('alert'), '.alert'],
    [by.tag('h1'), 'h1'],
    [by.text('Sign up'), 'text="Sign up"'],
    [by.linkText('Products'), 'link="Products"'],
    [by.testId('cart'), '[data-testid="cart"]'],
  ])('describes %o as %s', (locator, expected) => {
    expect(describeLocator(locator)).toBe(expected);
  });
});
