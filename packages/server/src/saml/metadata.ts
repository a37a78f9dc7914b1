import type { SamlSettings } from '@saml-federation/shared';

/**
 * Escape special XML characters
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Check the settings a metadata document is generated from.
 * Returns error identifiers; an empty list means the settings are usable.
 */
export function validateMetadataSettings(settings: SamlSettings): string[] {
  const errors: string[] = [];
  const { sp, organization, contactPerson } = settings;

  if (!sp.entityId) {
    errors.push('sp_entity_id_not_found');
  }

  if (!sp.assertionConsumerService.url) {
    errors.push('sp_acs_not_found');
  }

  if (sp.privateKey && !sp.x509cert) {
    errors.push('sp_cert_not_found_and_required');
  }

  for (const info of Object.values(organization)) {
    if (!info.name || !info.displayname || !info.url) {
      errors.push('organization_not_enough_data');
      break;
    }
  }

  for (const contact of [contactPerson.technical, contactPerson.support]) {
    if (!contact.givenName || !contact.emailAddress) {
      errors.push('contact_not_enough_data');
      break;
    }
  }

  return errors;
}

/**
 * Stamp validUntil and cacheDuration on a generated EntityDescriptor
 */
export function decorateMetadata(xml: string, settings: SamlSettings): string {
  const { metadataValidUntil, metadataCacheDuration } = settings.security;

  const attributes = [
    metadataValidUntil ? `validUntil="${escapeXml(metadataValidUntil)}"` : '',
    metadataCacheDuration ? `cacheDuration="${escapeXml(metadataCacheDuration)}"` : '',
  ]
    .filter(Boolean)
    .join(' ');

  if (!attributes) {
    return xml;
  }
  return xml.replace(/<((?:md:)?EntityDescriptor)\b/, `<$1 ${attributes}`);
}
