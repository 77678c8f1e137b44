import { EmailNotifier, sendTestEmail, type MailMessage, type MailTransport } from './email.js';
import { buildAlertEmail, escapeHtml, formatPrice } from './templates.js';
import { NotifyError } from '../errors.js';
import type { CrawlTarget, ListingItem } from '../types.js';

const TARGET: CrawlTarget = {
  siteId: 'immokh',
  canonicalUrl: 'https://www.immo-kh.be/fr/2/chercher-bien/a-vendre',
  filterSet: { price_max: 300000, cities: ['liège'] },
  identityKey: 'immokh:0000000000000000:1111111111111111',
};

const ITEMS: ListingItem[] = [
  {
    id: '123456',
    url: 'https://www.immo-kh.be/fr/bien/123456',
    title: 'Maison <3 ch>',
    price: 250000,
    location: 'Liège',
    bedrooms: 3,
    propertyType: 'house',
    publicationDate: null,
  },
  {
    id: '123455',
    url: 'https://www.immo-kh.be/fr/bien/123455',
    title: '',
    price: null,
    location: '',
    bedrooms: null,
    propertyType: null,
    publicationDate: null,
  },
];

const SMTP = { host: 'smtp.example.com', port: 587, user: 'alerts@example.com', password: 'test-secret', from: 'alerts@example.com' };
const NOW = new Date('2026-03-01T08:05:00.000Z');

describe('Alert email templates', () => {
  it('should format prices with grouped thousands', () => {
    expect(formatPrice(250000)).toBe('250 000€');
    expect(formatPrice(1234567)).toBe('1 234 567€');
    expect(formatPrice(950)).toBe('950€');
    expect(formatPrice(null)).toBe('—');
    expect(formatPrice(0)).toBe('—');
  });

  it('should escape html', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;');
  });

  it('should build the subject from the site and filters', () => {
    const email = buildAlertEmail(TARGET, ITEMS, NOW);
    expect(email.subject).toBe('[Alerts][Immo-KH] 2 nouvelle(s) annonce(s) — liège · ≤300000€');
  });

  it('should omit the subject tail without city or price filters', () => {
    const email = buildAlertEmail({ ...TARGET, filterSet: {} }, ITEMS.slice(0, 1), NOW);
    expect(email.subject).toBe('[Alerts][Immo-KH] 1 nouvelle(s) annonce(s)');
  });

  it('should render the plain-text body', () => {
    const email = buildAlertEmail(TARGET, ITEMS, NOW);
    expect(email.text.split('\n')).toEqual([
      'Site : Immo-KH',
      'Recherche : https://www.immo-kh.be/fr/2/chercher-bien/a-vendre',
      '',
      'Filtres :',
      '- Prix: — → 300000',
      '- Villes: liège',
      '',
      'Nouvelles annonces :',
      '- [123456] 250 000€ · Liège · Maison <3 ch>',
      '  https://www.immo-kh.be/fr/bien/123456',
      '- [123455] — · —',
      '  https://www.immo-kh.be/fr/bien/123455',
      '',
      'Voir la recherche : https://www.immo-kh.be/fr/2/chercher-bien/a-vendre',
    ]);
  });

  it('should render escaped rows in the html body', () => {
    const { html } = buildAlertEmail(TARGET, ITEMS, NOW);
    expect(html).toContain('>Maison &lt;3 ch&gt;</td>');
    expect(html).toContain('>250 000€</td>');
    expect(html).toContain('<a href="https://www.immo-kh.be/fr/bien/123456">Voir l’annonce</a>');
    expect(html).toContain('Villes: liège</span>');
    expect(html).toContain('Généré le 01/03/2026 08:05 UTC');
  });
});

describe('EmailNotifier', () => {
  let sendMail: jest.Mock<Promise<unknown>, [MailMessage]>;
  let transportFactory: jest.Mock<MailTransport, [typeof SMTP]>;

  beforeEach(() => {
    sendMail = jest.fn<Promise<unknown>, [MailMessage]>().mockResolvedValue({ messageId: '<msg-1@example.com>' });
    transportFactory = jest.fn<MailTransport, [typeof SMTP]>().mockReturnValue({ sendMail });
  });

  it('should send the alert to the subscriber', async () => {
    const notifier = new EmailNotifier({ enabled: true, smtp: SMTP, transportFactory, now: () => NOW });
    await notifier.notify('buyer@example.com', TARGET, ITEMS);

    expect(transportFactory).toHaveBeenCalledWith(SMTP);
    expect(sendMail).toHaveBeenCalledTimes(1);
    const message = sendMail.mock.calls[0][0];
    expect(message.from).toBe('alerts@example.com');
    expect(message.to).toBe('buyer@example.com');
    expect(message.subject).toBe('[Alerts][Immo-KH] 2 nouvelle(s) annonce(s) — liège · ≤300000€');
    expect(message.html).toContain('123455');
  });

  it('should reuse the transport across sends', async () => {
    const notifier = new EmailNotifier({ enabled: true, smtp: SMTP, transportFactory });
    await notifier.notify('buyer@example.com', TARGET, ITEMS);
    await notifier.notify('buyer@example.com', TARGET, ITEMS);

    expect(transportFactory).toHaveBeenCalledTimes(1);
    expect(sendMail).toHaveBeenCalledTimes(2);
  });

  it('should not send when delivery is disabled', async () => {
    const notifier = new EmailNotifier({ enabled: false, smtp: SMTP, transportFactory });
    await notifier.notify('buyer@example.com', TARGET, ITEMS);

    expect(transportFactory).not.toHaveBeenCalled();
  });

  it('should not send without SMTP settings', async () => {
    const notifier = new EmailNotifier({ enabled: true, smtp: null, transportFactory });
    await notifier.notify('buyer@example.com', TARGET, ITEMS);

    expect(sendMail).not.toHaveBeenCalled();
  });

  it('should raise a NotifyError when the SMTP server refuses', async () => {
    sendMail.mockRejectedValue(new Error('535 authentication failed'));
    const notifier = new EmailNotifier({ enabled: true, smtp: SMTP, transportFactory });

    await expect(notifier.notify('buyer@example.com', TARGET, ITEMS)).rejects.toThrow(NotifyError);
    await expect(notifier.notify('buyer@example.com', TARGET, ITEMS)).rejects.toThrow(
      'Sending to buyer@example.com failed: 535 authentication failed',
    );
  });

  it('should send a test message regardless of SEND_EMAIL', async () => {
    await sendTestEmail('me@example.com', { enabled: false, smtp: SMTP, transportFactory });

    expect(sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.com',
      to: 'me@example.com',
      subject: '[Alerts] Test e-mail',
      text: 'Test message: the SMTP configuration works.',
    });
  });

  it('should refuse a test message without SMTP settings', async () => {
    await expect(sendTestEmail('me@example.com', { smtp: null, transportFactory })).rejects.toThrow(NotifyError);
  });
});
