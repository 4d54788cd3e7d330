/**
 * Request bodies for the create endpoints used when provisioning tenants.
 * Field names follow the API's resource documentation, which mixes
 * PascalCase and camelCase between resources.
 */

export const MICROSOFT_PUBLISHER = { Id: 2, Name: 'Microsoft' } as const;

/** T1 tenants are billed directly; T2 through an indirect reseller. */
export const CustomerTenantType = {
  T1: 1,
  T2: 2,
} as const;
export type CustomerTenantType = (typeof CustomerTenantType)[keyof typeof CustomerTenantType];

export interface ContactInfo {
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
}

export interface PostalAddress {
  firstName: string;
  lastName: string;
  addressLine1: string;
  city: string;
  countryCode: string;
  region: string;
  postalCode: string;
}

export interface CustomerTenantInput {
  tenantName: string;
  domainPrefix: string;
  organization: { id: number; name?: string | null };
  invoiceProfile: { id: number; name?: string };
  contact: ContactInfo;
  address: PostalAddress;
  username?: string | null;
  tenantType?: CustomerTenantType;
  organizationRegistrationNumber?: string | null;
}

export interface CustomerTenantDetailed {
  Tenant: {
    Name: string;
    Publisher: typeof MICROSOFT_PUBLISHER;
    DomainPrefix: string;
    Organization: { Id: number; Name: string | null; ParentId: number };
    InvoiceProfile: { Id: number; Name: string };
    CustomerTenantType: CustomerTenantType;
  };
  Profile: {
    Contact: { FirstName: string; LastName: string; Email: string; PhoneNumber: string };
    Address: {
      FirstName: string;
      LastName: string;
      AddressLine1: string;
      City: string;
      CountryCode: string;
      CountryName: string | null;
      Region: string;
      PostalCode: string;
    };
  };
  Company: { OrganizationRegistrationNumber: string | null };
  User: { UserName: string | null };
}

export function buildCustomerTenant(input: CustomerTenantInput): CustomerTenantDetailed {
  return {
    Tenant: {
      Name: input.tenantName,
      Publisher: MICROSOFT_PUBLISHER,
      DomainPrefix: input.domainPrefix,
      Organization: {
        Id: input.organization.id,
        Name: input.organization.name ?? null,
        ParentId: 0,
      },
      InvoiceProfile: {
        Id: input.invoiceProfile.id,
        Name: input.invoiceProfile.name ?? 'Default',
      },
      CustomerTenantType: input.tenantType ?? CustomerTenantType.T1,
    },
    Profile: {
      Contact: {
        FirstName: input.contact.firstName,
        LastName: input.contact.lastName,
        Email: input.contact.email,
        PhoneNumber: input.contact.phoneNumber,
      },
      Address: {
        FirstName: input.address.firstName,
        LastName: input.address.lastName,
        AddressLine1: input.address.addressLine1,
        City: input.address.city,
        CountryCode: input.address.countryCode,
        CountryName: null,
        Region: input.address.region,
        PostalCode: input.address.postalCode,
      },
    },
    Company: {
      OrganizationRegistrationNumber: input.organizationRegistrationNumber ?? null,
    },
    User: {
      UserName: input.username ?? null,
    },
  };
}

export interface CustomerTenantAgreement {
  firstName: string;
  lastName: string;
  phoneNumber: string;
  email: string;
  dateAgreed: string;
  agreementType: number;
}

/** Microsoft Customer Agreement consent. */
export const MICROSOFT_CUSTOMER_AGREEMENT = 1;

/**
 * Formats a date as local `YYYY-MM-DDTHH:mm:ss`, the form the agreements
 * endpoint accepts for `dateAgreed`.
 */
export function formatAgreementDate(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function buildTenantAgreement(
  contact: ContactInfo,
  agreedAt: Date = new Date(),
): CustomerTenantAgreement {
  return {
    firstName: contact.firstName,
    lastName: contact.lastName,
    phoneNumber: contact.phoneNumber,
    email: contact.email,
    dateAgreed: formatAgreementDate(agreedAt),
    agreementType: MICROSOFT_CUSTOMER_AGREEMENT,
  };
}

export interface SubscriptionInput {
  name: string;
  tenantId: number;
  partNumber: string;
  quantity: number;
  billingCycle: number;
  /** ISO 8601 duration, e.g. P1M or P1Y. */
  termDuration: string;
}

export interface SubscriptionDetailed {
  name: string;
  customerTenant: { id: number };
  product: { partNumber: string };
  quantity: number;
  billingCycle: number;
  termDuration: string;
}

export function buildSubscription(input: SubscriptionInput): SubscriptionDetailed {
  return {
    name: input.name,
    customerTenant: { id: input.tenantId },
    product: { partNumber: input.partNumber },
    quantity: input.quantity,
    billingCycle: input.billingCycle,
    termDuration: input.termDuration,
  };
}
