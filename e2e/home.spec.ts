import { test } from '../src/harness/index.js';
import { BasePage } from '../src/pages/basePage.js';
import { by } from '../src/schema/locator.js';

test('home page renders the product catalogue', async ({ driver, reportSink, baseUrl, takeScreenshot }) => {
  const page = new BasePage(driver, { reporter: reportSink });

  await page.navigateTo(baseUrl);
  await page.assertTitle('Automation Exercise');
  await page.assertContainsText(by.css('.features_items h2.title'), 'Features Items');

  await page.click(by.css('a[href="/products"]'));
  await page.waitForUrlContains('/products');
  await takeScreenshot('products');
});
