import { EmailRepository } from '../email-repository';
import { EmailConfig } from '../../types/models/email';

const mockSesSendEmail = jest.fn();
const mockSendMail = jest.fn();
const mockCreateTransport = jest.fn();
const mockSetApiKey = jest.fn();
const mockSendGridSend = jest.fn();

jest.mock('@aws-sdk/client-ses', () => ({
  SES: class {
    sendEmail = (...args: unknown[]) => mockSesSendEmail(...args);
  },
}));

jest.mock('@sendgrid/mail', () => ({
  setApiKey: (...args: unknown[]) => mockSetApiKey(...args),
  send: (...args: unknown[]) => mockSendGridSend(...args),
}));

jest.mock('nodemailer', () => ({
  createTransport: (...args: unknown[]) => mockCreateTransport(...args),
}));

const baseConfig: EmailConfig = {
  provider: null,
  from: 'reports@example.com',
  recipients: ['desk@example.com', 'analyst@example.com'],
  awsRegion: 'us-east-1',
  smtp: { host: 'smtp.example.com', port: 587, username: 'reports@example.com', password: 'test-secret' },
};

describe('EmailRepository', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    mockCreateTransport.mockReturnValue({ sendMail: mockSendMail });
    mockSendMail.mockResolvedValue({});
    mockSesSendEmail.mockResolvedValue({});
    mockSendGridSend.mockResolvedValue([{ statusCode: 202 }, {}]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should not initialize without a provider', async () => {
    const repo = new EmailRepository(baseConfig);

    expect(repo.isInitialized()).toBe(false);
    await expect(repo.sendEmail('a@example.com', ['b@example.com'], 's', '<p></p>')).rejects.toThrow(
      'No email provider has been initialized',
    );
  });

  it('should send through SendGrid with the configured key', async () => {
    const repo = new EmailRepository({ ...baseConfig, provider: 'sendgrid', sendgridApiKey: 'test-sendgrid-key' });

    expect(repo.isInitialized()).toBe(true);
    expect(mockSetApiKey).toHaveBeenCalledWith('test-sendgrid-key');

    await repo.sendEmail('reports@example.com', baseConfig.recipients, 'Subject', '<p>Hi</p>');

    expect(mockSendGridSend).toHaveBeenCalledWith({
      from: 'reports@example.com',
      to: ['desk@example.com', 'analyst@example.com'],
      subject: 'Subject',
      html: '<p>Hi</p>',
    });
    expect(mockSendMail).not.toHaveBeenCalled();
  });

  it('should not initialize SendGrid without an API key', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const repo = new EmailRepository({ ...baseConfig, provider: 'sendgrid' });

    expect(repo.isInitialized()).toBe(false);
    expect(mockSetApiKey).not.toHaveBeenCalled();
  });

  it('should send through SES', async () => {
    const repo = new EmailRepository({ ...baseConfig, provider: 'ses' });

    await repo.sendEmail('reports@example.com', ['desk@example.com'], 'Subject', '<p>Hi</p>');

    expect(mockSesSendEmail).toHaveBeenCalledWith({
      Source: 'reports@example.com',
      Destination: { ToAddresses: ['desk@example.com'] },
      Message: {
        Subject: { Data: 'Subject', Charset: 'UTF-8' },
        Body: { Html: { Data: '<p>Hi</p>', Charset: 'UTF-8' } },
      },
    });
  });

  it('should use STARTTLS with credentials on port 587', async () => {
    const repo = new EmailRepository({ ...baseConfig, provider: 'smtp' });

    expect(repo.isInitialized()).toBe(true);
    expect(mockCreateTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 587,
      secure: false,
      requireTLS: true,
      auth: { user: 'reports@example.com', pass: 'test-secret' },
    });

    await repo.sendEmail('reports@example.com', baseConfig.recipients, 'Subject', '<p>Hi</p>');
    expect(mockSendMail).toHaveBeenCalledWith({
      from: 'reports@example.com',
      to: 'desk@example.com, analyst@example.com',
      subject: 'Subject',
      html: '<p>Hi</p>',
    });
  });

  it('should use implicit TLS on port 465 and skip auth without a password', () => {
    new EmailRepository({
      ...baseConfig,
      provider: 'smtp',
      smtp: { host: 'smtp.example.com', port: 465, username: 'reports@example.com' },
    });

    expect(mockCreateTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 465,
      secure: true,
      requireTLS: false,
      auth: undefined,
    });
  });

  it('should propagate transport failures', async () => {
    mockSendMail.mockRejectedValueOnce(new Error('connection refused'));
    const repo = new EmailRepository({ ...baseConfig, provider: 'smtp' });

    await expect(
      repo.sendEmail('reports@example.com', ['desk@example.com'], 'Subject', '<p>Hi</p>'),
    ).rejects.toThrow('connection refused');
  });
});
