import countries from 'i18n-iso-countries';
import enLocale from 'i18n-iso-countries/langs/en.json' with { type: 'json' };

countries.registerLocale(enLocale);

/**
 * ISO 3166-1 alpha-3 lookups, English names
 */
export class CountryLookup {
    isValid(iso3: string): boolean {
        const code = iso3.trim().toUpperCase();
        return code.length === 3 && countries.isValid(code);
    }

    /**
     * @returns the English short name, or null for an unknown code
     */
    getName(iso3: string): string | null {
        if (!this.isValid(iso3)) {
            return null;
        }
        return countries.getName(iso3.trim().toUpperCase(), 'en') ?? null;
    }
}
